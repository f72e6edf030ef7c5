/**
 * Shared utilities and types for the stock sync job
 */

export * from './channels';

/**
 * Format an integer count with thousands separators
 */
export function formatCount(value: number): string {
  return new Intl.NumberFormat('en-GB').format(value);
}

/**
 * Format a duration in milliseconds as seconds with one decimal
 */
export function formatDuration(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}
