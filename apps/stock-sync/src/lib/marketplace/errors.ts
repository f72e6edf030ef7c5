/**
 * Marketplace API error classes
 *
 * Shared by the Ozon and Yandex Market clients. None of these are retried:
 * they propagate to the sync runner, which ends the run.
 */

import type { Marketplace } from '@stock-sync/shared';

export type MarketplaceErrorCode =
  | 'API_ERROR'
  | 'TIMEOUT'
  | 'NETWORK_ERROR'
  | 'MALFORMED_RESPONSE';

/**
 * Error class for failed marketplace requests (non-2xx, timeout, connection failure)
 */
export class MarketplaceApiError extends Error {
  constructor(
    message: string,
    public readonly marketplace: Marketplace,
    public readonly code: MarketplaceErrorCode,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'MarketplaceApiError';
  }
}

/**
 * Error class for a successful response whose payload lacks the expected fields
 */
export class MarketplaceResponseError extends MarketplaceApiError {
  constructor(
    message: string,
    marketplace: Marketplace,
    public readonly issues: string[] = []
  ) {
    super(message, marketplace, 'MALFORMED_RESPONSE');
    this.name = 'MarketplaceResponseError';
  }
}

/**
 * True for errors caused by rejected credentials
 */
export function isAuthError(error: unknown): boolean {
  return (
    error instanceof MarketplaceApiError &&
    (error.statusCode === 401 || error.statusCode === 403)
  );
}
