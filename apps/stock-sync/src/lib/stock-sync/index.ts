export * from './stock-sync.types';
export {
  bucketQuantity,
  buildPriceUpdates,
  buildStockUpdates,
  filterInStock,
  formatTimestamp,
  normalizePriceText,
  MANY_IN_STOCK_QUANTITY,
  PriceParseError,
  QuantityParseError,
} from './reconciliation';
export { StockSyncService } from './stock-sync.service';
export { createChannelClient } from './channel-client.factory';
export {
  checkConnections,
  describeFailure,
  formatConnectionCheck,
  formatSyncReport,
  parseSyncArgs,
  runStockSync,
  type ConnectionCheckResult,
  type SyncRunDependencies,
  type SyncRunOptions,
} from './stock-sync.runner';
