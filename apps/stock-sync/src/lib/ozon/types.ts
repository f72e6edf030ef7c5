/**
 * Ozon Seller API Types
 */

import { z } from 'zod';

/**
 * Credentials for one Ozon seller account
 */
export interface OzonCredentials {
  clientId: string;
  sellerToken: string;
}

// ============================================================================
// PRODUCT LIST
// ============================================================================

export type OzonVisibility = 'ALL' | 'VISIBLE' | 'INVISIBLE' | 'EMPTY_STOCK' | 'ARCHIVED';

export interface OzonProductListRequest {
  filter: {
    visibility: OzonVisibility;
  };
  last_id: string;
  limit: number;
}

export const ozonProductListResponseSchema = z.object({
  result: z.object({
    items: z.array(
      z.object({
        product_id: z.number().optional(),
        offer_id: z.string(),
      })
    ),
    total: z.number().int().nonnegative(),
    last_id: z.string().nullish(),
  }),
});

export type OzonProductListPage = z.infer<typeof ozonProductListResponseSchema>['result'];

// ============================================================================
// STOCKS AND PRICES
// ============================================================================

export interface OzonStockItem {
  offer_id: string;
  stock: number;
}

export interface OzonPriceItem {
  auto_action_enabled: 'ENABLED' | 'DISABLED' | 'UNKNOWN';
  currency_code: string;
  offer_id: string;
  old_price: string;
  price: string;
}

/**
 * Body of a non-2xx response
 */
export const ozonErrorResponseSchema = z.object({
  code: z.number().optional(),
  message: z.string().optional(),
  details: z.array(z.unknown()).optional(),
});
