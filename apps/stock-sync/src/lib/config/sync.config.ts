/**
 * Stock Sync Configuration
 *
 * Reads channel credentials, warehouse ids and batch size overrides from the
 * environment. A channel is enabled when its credentials are present:
 *
 * - Ozon: OZON_CLIENT_ID + OZON_SELLER_TOKEN
 * - Yandex Market FBS: MARKET_TOKEN + MARKET_FBS_CAMPAIGN_ID + MARKET_FBS_WAREHOUSE_ID
 * - Yandex Market DBS: MARKET_TOKEN + MARKET_DBS_CAMPAIGN_ID + MARKET_DBS_WAREHOUSE_ID
 */

import { z } from 'zod';
import type { Channel } from '@stock-sync/shared';
import type { BatchLimits } from '@/lib/marketplace/channel-client.interface';
import { DEFAULT_ARCHIVE_URL } from '@/lib/inventory-snapshot/snapshot.client';
import type { OzonCredentials } from '@/lib/ozon/types';
import type { YandexMarketCredentials, YandexMarketPlacement } from '@/lib/yandex-market/types';

/**
 * Error class for invalid environment configuration
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

// ============================================================================
// ENVIRONMENT SCHEMA
// ============================================================================

/** Empty strings count as unset */
const optionalString = z
  .string()
  .trim()
  .transform((val) => val || undefined)
  .optional();

const optionalBatchSize = z
  .string()
  .trim()
  .transform((val) => val || undefined)
  .pipe(z.coerce.number().int().positive().optional())
  .optional();

export const syncEnvSchema = z.object({
  INVENTORY_ARCHIVE_URL: optionalString.pipe(z.string().url().optional()),

  OZON_CLIENT_ID: optionalString,
  OZON_SELLER_TOKEN: optionalString,
  OZON_STOCK_BATCH_SIZE: optionalBatchSize,
  OZON_PRICE_BATCH_SIZE: optionalBatchSize,

  MARKET_TOKEN: optionalString,
  MARKET_FBS_CAMPAIGN_ID: optionalString,
  MARKET_FBS_WAREHOUSE_ID: optionalString,
  MARKET_DBS_CAMPAIGN_ID: optionalString,
  MARKET_DBS_WAREHOUSE_ID: optionalString,
  MARKET_STOCK_BATCH_SIZE: optionalBatchSize,
  MARKET_PRICE_BATCH_SIZE: optionalBatchSize,
});

export type SyncEnv = z.infer<typeof syncEnvSchema>;

// ============================================================================
// CONFIG TYPES
// ============================================================================

export interface OzonChannelConfig {
  channel: 'ozon';
  credentials: OzonCredentials;
  batchLimits: Partial<BatchLimits>;
}

export interface YandexMarketChannelConfig {
  channel: 'market-fbs' | 'market-dbs';
  placement: YandexMarketPlacement;
  credentials: YandexMarketCredentials;
  batchLimits: Partial<BatchLimits>;
}

export type ChannelConfig = OzonChannelConfig | YandexMarketChannelConfig;

export interface SyncConfig {
  archiveUrl: string;
  /** Enabled channels, in run order */
  channels: ChannelConfig[];
}

// ============================================================================
// LOADING
// ============================================================================

function batchLimits(stocks: number | undefined, prices: number | undefined): Partial<BatchLimits> {
  return {
    ...(stocks !== undefined ? { stocks } : {}),
    ...(prices !== undefined ? { prices } : {}),
  };
}

function loadYandexMarketChannel(
  env: SyncEnv,
  placement: YandexMarketPlacement,
  campaignId: string | undefined,
  warehouseId: string | undefined,
  issues: string[]
): YandexMarketChannelConfig | null {
  if (!campaignId) {
    if (warehouseId) {
      issues.push(`MARKET_${placement}_WAREHOUSE_ID is set without MARKET_${placement}_CAMPAIGN_ID`);
    }
    return null;
  }
  if (!warehouseId) {
    issues.push(`MARKET_${placement}_WAREHOUSE_ID is required with MARKET_${placement}_CAMPAIGN_ID`);
  }
  if (!env.MARKET_TOKEN) {
    issues.push(`MARKET_TOKEN is required with MARKET_${placement}_CAMPAIGN_ID`);
  }
  if (!warehouseId || !env.MARKET_TOKEN) {
    return null;
  }

  return {
    channel: placement === 'FBS' ? 'market-fbs' : 'market-dbs',
    placement,
    credentials: {
      accessToken: env.MARKET_TOKEN,
      campaignId,
      warehouseId,
    },
    batchLimits: batchLimits(env.MARKET_STOCK_BATCH_SIZE, env.MARKET_PRICE_BATCH_SIZE),
  };
}

/**
 * Build the sync configuration from environment variables
 *
 * @throws ConfigError when a variable is invalid, a channel is half-configured,
 *   or no channel is configured at all
 */
export function loadSyncConfig(env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const parsed = syncEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid environment',
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const issues: string[] = [];
  const channels: ChannelConfig[] = [];

  if (values.OZON_CLIENT_ID && values.OZON_SELLER_TOKEN) {
    channels.push({
      channel: 'ozon',
      credentials: {
        clientId: values.OZON_CLIENT_ID,
        sellerToken: values.OZON_SELLER_TOKEN,
      },
      batchLimits: batchLimits(values.OZON_STOCK_BATCH_SIZE, values.OZON_PRICE_BATCH_SIZE),
    });
  } else if (values.OZON_CLIENT_ID || values.OZON_SELLER_TOKEN) {
    issues.push('OZON_CLIENT_ID and OZON_SELLER_TOKEN must be set together');
  }

  const fbs = loadYandexMarketChannel(
    values,
    'FBS',
    values.MARKET_FBS_CAMPAIGN_ID,
    values.MARKET_FBS_WAREHOUSE_ID,
    issues
  );
  if (fbs) channels.push(fbs);

  const dbs = loadYandexMarketChannel(
    values,
    'DBS',
    values.MARKET_DBS_CAMPAIGN_ID,
    values.MARKET_DBS_WAREHOUSE_ID,
    issues
  );
  if (dbs) channels.push(dbs);

  if (issues.length > 0) {
    throw new ConfigError('Invalid channel configuration', issues);
  }
  if (channels.length === 0) {
    throw new ConfigError('No channel configured');
  }

  return {
    archiveUrl: values.INVENTORY_ARCHIVE_URL ?? DEFAULT_ARCHIVE_URL,
    channels,
  };
}

/**
 * Keep only the requested channels, preserving run order
 *
 * @throws ConfigError when a requested channel is not configured
 */
export function selectChannels(config: SyncConfig, requested: Channel[]): ChannelConfig[] {
  if (requested.length === 0) {
    return config.channels;
  }

  const configured = new Set(config.channels.map((c) => c.channel));
  const missing = requested.filter((channel) => !configured.has(channel));
  if (missing.length > 0) {
    throw new ConfigError(`Channel not configured: ${missing.join(', ')}`);
  }

  return config.channels.filter((c) => requested.includes(c.channel));
}
