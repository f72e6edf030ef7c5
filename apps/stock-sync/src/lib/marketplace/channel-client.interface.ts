/**
 * Channel Client Interface
 *
 * Common interface for the marketplace clients (Ozon, Yandex Market).
 * The stock sync service drives every channel through this interface.
 */

import type { Channel, Marketplace } from '@stock-sync/shared';
import type { PriceUpdate, StockUpdate } from '@/lib/stock-sync/stock-sync.types';

/**
 * Maximum number of updates per write request
 */
export interface BatchLimits {
  stocks: number;
  prices: number;
}

/**
 * Channel Client Interface
 *
 * One instance per channel per run; instances share nothing but credentials.
 */
export interface ChannelClient {
  /** The channel identifier */
  readonly channel: Channel;

  /** The marketplace the channel belongs to */
  readonly marketplace: Marketplace;

  /** Warehouse recorded on stock updates, if the channel has one */
  readonly warehouseId: string | null;

  /** Currency code sent with price updates */
  readonly currencyCode: string;

  /** Batch sizes the channel's write endpoints accept */
  readonly batchLimits: BatchLimits;

  /**
   * Test the connection using the channel credentials
   * @returns false when the credentials are rejected
   */
  testConnection(): Promise<boolean>;

  /**
   * Read every offer identifier listed on the channel, following pagination
   */
  getOfferIds(): Promise<Set<string>>;

  /**
   * Submit one batch of stock updates
   * @returns The marketplace acknowledgement payload
   */
  updateStocks(stocks: StockUpdate[]): Promise<unknown>;

  /**
   * Submit one batch of price updates
   * @returns The marketplace acknowledgement payload
   */
  updatePrices(prices: PriceUpdate[]): Promise<unknown>;
}
