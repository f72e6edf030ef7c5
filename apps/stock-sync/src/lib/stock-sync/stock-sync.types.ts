/**
 * Stock Sync Types
 *
 * Normalized records flowing from the inventory snapshot to the marketplace
 * write endpoints. Marketplace clients map these onto their own payloads.
 */

import type { Channel } from '@stock-sync/shared';

// ============================================================================
// INPUT RECORDS
// ============================================================================

/**
 * One row of the supplier inventory snapshot
 */
export interface InventoryRecord {
  /** Merchant product code, the join key with marketplace offer ids */
  identifier: string;
  /** Literal count, the sentinel ">10", or empty */
  quantityDescriptor: string;
  /** Locale-formatted price, e.g. "5'990.00 руб." */
  priceText: string;
}

// ============================================================================
// DERIVED UPDATES
// ============================================================================

export interface StockUpdate {
  identifier: string;
  quantity: number;
  /** ISO-8601 UTC, second precision */
  timestamp: string;
  warehouseId: string | null;
}

export interface PriceUpdate {
  identifier: string;
  /** Whole currency units */
  price: number;
  currencyCode: string;
}

// ============================================================================
// RUN RESULTS
// ============================================================================

export interface ChannelSyncOptions {
  /** Reconcile and report without submitting anything */
  dryRun?: boolean;
}

/**
 * Result of syncing one channel
 */
export interface ChannelSyncResult {
  channel: Channel;
  catalogSize: number;
  stocks: StockUpdate[];
  /** Stock updates with a non-zero quantity */
  inStock: StockUpdate[];
  prices: PriceUpdate[];
  stockBatches: number;
  priceBatches: number;
  /** Acknowledgement payloads, one per submitted batch */
  acknowledgements: unknown[];
  dryRun: boolean;
  durationMs: number;
}
