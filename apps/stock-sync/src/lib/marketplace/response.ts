import type { z } from 'zod';
import type { Marketplace } from '@stock-sync/shared';
import { MarketplaceResponseError } from './errors';

/**
 * Validate a response payload, throwing MarketplaceResponseError with the zod issues
 */
export function parseMarketplaceResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  marketplace: Marketplace,
  description: string
): z.infer<T> {
  const parsed = schema.safeParse(data);

  if (!parsed.success) {
    throw new MarketplaceResponseError(
      `Unexpected ${description} response`,
      marketplace,
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return parsed.data;
}
