/**
 * Centralized channel definitions for the stock sync job.
 *
 * A channel is one selling account on one marketplace. Yandex Market is
 * split into its FBS (marketplace warehouse) and DBS (own delivery) campaigns.
 */

export const MARKETPLACES = ['ozon', 'yandex-market'] as const;
export type Marketplace = (typeof MARKETPLACES)[number];

export const CHANNELS = ['ozon', 'market-fbs', 'market-dbs'] as const;
export type Channel = (typeof CHANNELS)[number];

/**
 * Display labels for channels (used in run reports)
 */
export const CHANNEL_LABELS: Record<Channel, string> = {
  ozon: 'Ozon',
  'market-fbs': 'Yandex Market FBS',
  'market-dbs': 'Yandex Market DBS',
};

/**
 * Get display label for a channel
 */
export function getChannelLabel(channel: Channel): string {
  return CHANNEL_LABELS[channel];
}

/**
 * Check if a value is a known channel
 */
export function isChannel(value: string): value is Channel {
  return CHANNELS.some((channel) => channel === value);
}
