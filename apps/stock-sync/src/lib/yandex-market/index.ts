export { YandexMarketClient, YANDEX_MARKET_BATCH_LIMITS } from './client';
export type {
  OfferMappingEntriesPage,
  YandexMarketCredentials,
  YandexMarketPlacement,
  YandexMarketPriceOffer,
  YandexMarketStockSku,
} from './types';
