/**
 * Yandex Market Partner API Client
 *
 * One client per campaign (FBS or DBS). Authenticates with an OAuth bearer token.
 * @see https://yandex.ru/dev/market/partner-api/doc/
 */

import type { Channel, Marketplace } from '@stock-sync/shared';
import type { BatchLimits, ChannelClient } from '@/lib/marketplace/channel-client.interface';
import { MarketplaceApiError, MarketplaceResponseError, isAuthError } from '@/lib/marketplace/errors';
import { parseMarketplaceResponse } from '@/lib/marketplace/response';
import type { PriceUpdate, StockUpdate } from '@/lib/stock-sync/stock-sync.types';
import {
  offerMappingEntriesResponseSchema,
  yandexMarketErrorResponseSchema,
  type OfferMappingEntriesPage,
  type YandexMarketCredentials,
  type YandexMarketPlacement,
  type YandexMarketPriceOffer,
  type YandexMarketStockSku,
} from './types';

const BASE_URL = 'https://api.partner.market.yandex.ru';

/** Request timeout in milliseconds */
const REQUEST_TIMEOUT = 30000;

/** Offers per offer-mapping-entries page */
const OFFER_MAPPING_LIMIT = 200;

/** Default write batch sizes */
export const YANDEX_MARKET_BATCH_LIMITS: BatchLimits = {
  stocks: 2000,
  prices: 500,
};

const MARKETPLACE: Marketplace = 'yandex-market';

const PLACEMENT_CHANNELS: Record<YandexMarketPlacement, Channel> = {
  FBS: 'market-fbs',
  DBS: 'market-dbs',
};

/**
 * Yandex Market Partner API client for one campaign
 */
export class YandexMarketClient implements ChannelClient {
  readonly channel: Channel;
  readonly marketplace = MARKETPLACE;
  readonly currencyCode = 'RUR';
  readonly warehouseId: string;
  readonly batchLimits: BatchLimits;

  private credentials: YandexMarketCredentials;

  constructor(
    placement: YandexMarketPlacement,
    credentials: YandexMarketCredentials,
    batchLimits: Partial<BatchLimits> = {}
  ) {
    this.channel = PLACEMENT_CHANNELS[placement];
    this.credentials = credentials;
    this.warehouseId = credentials.warehouseId;
    this.batchLimits = { ...YANDEX_MARKET_BATCH_LIMITS, ...batchLimits };
  }

  /**
   * Make an authenticated request to the campaign's endpoints
   */
  private async request(
    path: string,
    options: {
      method?: 'GET' | 'POST' | 'PUT';
      params?: Record<string, string | number | undefined>;
      body?: unknown;
    } = {}
  ): Promise<unknown> {
    const { method = 'GET', params, body } = options;

    const url = new URL(`${BASE_URL}/campaigns/${this.credentials.campaignId}${path}`);
    if (params) {
      Object.entries(params).forEach(([key, value]) => {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      });
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT);

    try {
      const response = await fetch(url.toString(), {
        method,
        headers: {
          Authorization: `Bearer ${this.credentials.accessToken}`,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: body ? JSON.stringify(body) : undefined,
        signal: controller.signal,
      });

      clearTimeout(timeoutId);

      if (!response.ok) {
        let errorMessage = `Request failed with status ${response.status}`;
        try {
          const errorData = yandexMarketErrorResponseSchema.safeParse(await response.json());
          const errors = errorData.success ? errorData.data.errors : undefined;
          if (errors && errors.length > 0) {
            errorMessage = errors.map((e) => e.message ?? e.code).join('; ');
          }
        } catch {
          // Error body is not JSON; keep the status message
        }
        throw new MarketplaceApiError(errorMessage, MARKETPLACE, 'API_ERROR', response.status);
      }

      return await response.json();
    } catch (error) {
      clearTimeout(timeoutId);

      if (error instanceof MarketplaceApiError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        throw new MarketplaceApiError('Request timeout', MARKETPLACE, 'TIMEOUT', 408);
      }

      if (error instanceof SyntaxError) {
        throw new MarketplaceResponseError('Response body is not valid JSON', MARKETPLACE);
      }

      throw new MarketplaceApiError(
        error instanceof Error ? error.message : 'Unknown error',
        MARKETPLACE,
        'NETWORK_ERROR'
      );
    }
  }

  /**
   * Test the connection with the provided credentials
   */
  async testConnection(): Promise<boolean> {
    try {
      await this.getOfferMappingPage('', 1);
      return true;
    } catch (error) {
      console.error('[YandexMarketClient testConnection] Error:', error);
      if (isAuthError(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Get one page of offer mapping entries
   * @param pageToken Token returned by the previous page ('' for the first)
   */
  async getOfferMappingPage(
    pageToken: string,
    limit: number = OFFER_MAPPING_LIMIT
  ): Promise<OfferMappingEntriesPage> {
    const response = await this.request('/offer-mapping-entries', {
      params: { page_token: pageToken || undefined, limit },
    });
    return parseMarketplaceResponse(
      offerMappingEntriesResponseSchema,
      response,
      MARKETPLACE,
      'offer mapping'
    ).result;
  }

  /**
   * Get the shop SKU of every offer in the campaign, following nextPageToken
   */
  async getOfferIds(): Promise<Set<string>> {
    const offerIds = new Set<string>();
    let pageToken = '';
    let page = 0;

    do {
      page++;
      const result = await this.getOfferMappingPage(pageToken);

      for (const entry of result.offerMappingEntries) {
        offerIds.add(entry.offer.shopSku);
      }
      pageToken = result.paging.nextPageToken ?? '';
    } while (pageToken);

    console.log(
      `[YandexMarketClient] Fetched ${offerIds.size} offer ids for ${this.channel} across ${page} pages`
    );
    return offerIds;
  }

  /**
   * Update stock levels for one batch
   *
   * @returns The acknowledgement body as sent by Yandex Market
   */
  async updateStocks(stocks: StockUpdate[]): Promise<unknown> {
    const skus: YandexMarketStockSku[] = stocks.map((stock) => ({
      sku: stock.identifier,
      warehouseId: stock.warehouseId ?? this.warehouseId,
      items: [
        {
          count: stock.quantity,
          type: 'FIT',
          updatedAt: stock.timestamp,
        },
      ],
    }));

    return this.request('/offers/stocks', {
      method: 'PUT',
      body: { skus },
    });
  }

  /**
   * Set prices for one batch
   */
  async updatePrices(prices: PriceUpdate[]): Promise<unknown> {
    const offers: YandexMarketPriceOffer[] = prices.map((price) => ({
      id: price.identifier,
      price: {
        value: price.price,
        currencyId: price.currencyCode,
      },
    }));

    return this.request('/offer-prices/updates', {
      method: 'POST',
      body: { offers },
    });
  }
}
