export { OzonClient, OZON_BATCH_LIMITS } from './client';
export type {
  OzonCredentials,
  OzonPriceItem,
  OzonProductListPage,
  OzonStockItem,
} from './types';
