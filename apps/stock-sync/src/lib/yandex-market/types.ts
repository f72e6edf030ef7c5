/**
 * Yandex Market Partner API Types
 */

import { z } from 'zod';

/**
 * Credentials for one Yandex Market campaign
 */
export interface YandexMarketCredentials {
  accessToken: string;
  campaignId: string;
  /** Warehouse the campaign's stock is reported for */
  warehouseId: string;
}

/** Yandex Market campaign placement models handled by the sync */
export type YandexMarketPlacement = 'FBS' | 'DBS';

// ============================================================================
// OFFER MAPPING ENTRIES
// ============================================================================

export const offerMappingEntriesResponseSchema = z.object({
  status: z.string().optional(),
  result: z.object({
    paging: z.object({
      nextPageToken: z.string().nullish(),
      prevPageToken: z.string().nullish(),
    }),
    offerMappingEntries: z.array(
      z.object({
        offer: z.object({
          shopSku: z.string(),
          name: z.string().optional(),
        }),
      })
    ),
  }),
});

export type OfferMappingEntriesPage = z.infer<typeof offerMappingEntriesResponseSchema>['result'];

// ============================================================================
// STOCKS AND PRICES
// ============================================================================

export type YandexMarketStockType = 'FIT';

export interface YandexMarketStockSku {
  sku: string;
  warehouseId: string;
  items: Array<{
    count: number;
    type: YandexMarketStockType;
    updatedAt: string;
  }>;
}

export interface YandexMarketPriceOffer {
  id: string;
  price: {
    value: number;
    currencyId: string;
  };
}

/**
 * Body of a non-2xx response
 */
export const yandexMarketErrorResponseSchema = z.object({
  status: z.string().optional(),
  errors: z
    .array(
      z.object({
        code: z.string(),
        message: z.string().optional(),
      })
    )
    .optional(),
});
