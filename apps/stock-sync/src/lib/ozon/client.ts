/**
 * Ozon Seller API Client
 *
 * Reads the seller's product list and pushes stock and price imports.
 * Authenticates with the Client-Id / Api-Key header pair.
 * @see https://docs.ozon.ru/api/seller/
 */

import type { Marketplace } from '@stock-sync/shared';
import type { BatchLimits, ChannelClient } from '@/lib/marketplace/channel-client.interface';
import { MarketplaceApiError, MarketplaceResponseError, isAuthError } from '@/lib/marketplace/errors';
import { parseMarketplaceResponse } from '@/lib/marketplace/response';
import type { PriceUpdate, StockUpdate } from '@/lib/stock-sync/stock-sync.types';
import {
  ozonErrorResponseSchema,
  ozonProductListResponseSchema,
  type OzonCredentials,
  type OzonPriceItem,
  type OzonProductListPage,
  type OzonProductListRequest,
  type OzonStockItem,
} from './types';

const BASE_URL = 'https://api-seller.ozon.ru';

/** Request timeout in milliseconds */
const REQUEST_TIMEOUT = 30000;

/** Products per product list page (API maximum) */
const PRODUCT_LIST_LIMIT = 1000;

/** Default write batch sizes */
export const OZON_BATCH_LIMITS: BatchLimits = {
  stocks: 100,
  prices: 900,
};

const MARKETPLACE: Marketplace = 'ozon';

/**
 * Ozon Seller API client for one seller account
 */
export class OzonClient implements ChannelClient {
  readonly channel = 'ozon' as const;
  readonly marketplace = MARKETPLACE;
  readonly currencyCode = 'RUB';
  /** Seller-warehouse stock imports are account-wide */
  readonly warehouseId = null;
  readonly batchLimits: BatchLimits;

  private credentials: OzonCredentials;

  constructor(credentials: OzonCredentials, batchLimits: Partial<BatchLimits> = {}) {
    this.credentials = credentials;
    this.batchLimits = { ...OZON_BATCH_LIMITS, ...batchLimits };
  }

  /**
   * Make an authenticated POST request to the Seller API
   */
  private async request(path: string, body: unknown): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), REQUEST_TIMEOUT);

    try {
      const response = await fetch(`${BASE_URL}${path}`, {
        method: 'POST',
        headers: {
          'Client-Id': this.credentials.clientId,
          'Api-Key': this.credentials.sellerToken,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });

      clearTimeout(timeoutId);

      if (!response.ok) {
        let errorMessage = `Request failed with status ${response.status}`;
        try {
          const errorData = ozonErrorResponseSchema.safeParse(await response.json());
          if (errorData.success && errorData.data.message) {
            errorMessage = errorData.data.message;
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
      await this.getProductListPage('', 1);
      return true;
    } catch (error) {
      console.error('[OzonClient testConnection] Error:', error);
      if (isAuthError(error)) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Get one page of the product list
   * @param lastId Cursor returned by the previous page ('' for the first)
   */
  async getProductListPage(
    lastId: string,
    limit: number = PRODUCT_LIST_LIMIT
  ): Promise<OzonProductListPage> {
    const body: OzonProductListRequest = {
      filter: { visibility: 'ALL' },
      last_id: lastId,
      limit,
    };

    const response = await this.request('/v2/product/list', body);
    return parseMarketplaceResponse(ozonProductListResponseSchema, response, MARKETPLACE, 'product list')
      .result;
  }

  /**
   * Get the offer ids of every product, following the last_id cursor
   *
   * Stops once the collected item count reaches the reported total, or when
   * no cursor is returned.
   */
  async getOfferIds(): Promise<Set<string>> {
    const offerIds = new Set<string>();
    let itemCount = 0;
    let lastId = '';
    let page = 0;

    for (;;) {
      page++;
      const result = await this.getProductListPage(lastId);

      itemCount += result.items.length;
      for (const item of result.items) {
        offerIds.add(item.offer_id);
      }

      if (itemCount >= result.total || !result.last_id) {
        break;
      }
      lastId = result.last_id;
    }

    console.log(`[OzonClient] Fetched ${offerIds.size} offer ids across ${page} pages`);
    return offerIds;
  }

  /**
   * Import stock levels for one batch
   *
   * @returns The acknowledgement body as sent by Ozon
   */
  async updateStocks(stocks: StockUpdate[]): Promise<unknown> {
    const items: OzonStockItem[] = stocks.map((stock) => ({
      offer_id: stock.identifier,
      stock: stock.quantity,
    }));

    return this.request('/v1/product/import/stocks', { stocks: items });
  }

  /**
   * Import prices for one batch
   */
  async updatePrices(prices: PriceUpdate[]): Promise<unknown> {
    const items: OzonPriceItem[] = prices.map((price) => ({
      auto_action_enabled: 'UNKNOWN',
      currency_code: price.currencyCode,
      offer_id: price.identifier,
      old_price: '0',
      price: String(price.price),
    }));

    return this.request('/v1/product/import/prices', { prices: items });
  }
}
