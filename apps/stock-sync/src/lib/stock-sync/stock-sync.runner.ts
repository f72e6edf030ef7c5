/**
 * Stock Sync Runner
 *
 * The run boundary: parses command line flags, downloads the inventory
 * snapshot once, syncs the selected channels in order and formats the
 * report. `--check` only verifies each channel's credentials. Errors are not
 * caught here; the entry script logs them.
 */

import { formatCount, formatDuration, getChannelLabel, isChannel, type Channel } from '@stock-sync/shared';
import { ConfigError, selectChannels, type ChannelConfig, type SyncConfig } from '@/lib/config/sync.config';
import {
  InventorySnapshotClient,
  InventorySnapshotError,
  type InventorySnapshot,
} from '@/lib/inventory-snapshot';
import {
  MarketplaceApiError,
  MarketplaceResponseError,
  type ChannelClient,
} from '@/lib/marketplace';
import { createChannelClient } from './channel-client.factory';
import { StockSyncService } from './stock-sync.service';
import type { ChannelSyncResult } from './stock-sync.types';

export interface SyncRunOptions {
  /** Channels to sync; empty means every configured channel */
  channels: Channel[];
  dryRun: boolean;
  /** Verify credentials instead of syncing */
  check: boolean;
}

export interface ConnectionCheckResult {
  channel: Channel;
  connected: boolean;
}

export interface SyncRunDependencies {
  fetchSnapshot?: (archiveUrl: string) => Promise<InventorySnapshot>;
  createClient?: (config: ChannelConfig) => ChannelClient;
  now?: () => Date;
}

/**
 * Parse `--channel=<name>` (repeatable), `--dry-run` and `--check`
 *
 * @throws ConfigError for unknown flags or channels
 */
export function parseSyncArgs(args: string[]): SyncRunOptions {
  const options: SyncRunOptions = { channels: [], dryRun: false, check: false };

  for (const arg of args) {
    if (arg === '--dry-run') {
      options.dryRun = true;
    } else if (arg === '--check') {
      options.check = true;
    } else if (arg.startsWith('--channel=')) {
      const value = arg.slice('--channel='.length);
      if (!isChannel(value)) {
        throw new ConfigError(`Unknown channel: ${value}`);
      }
      if (!options.channels.includes(value)) {
        options.channels.push(value);
      }
    } else {
      throw new ConfigError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

async function downloadSnapshot(archiveUrl: string): Promise<InventorySnapshot> {
  return new InventorySnapshotClient(archiveUrl).fetchSnapshot();
}

/**
 * Run the sync for the selected channels
 */
export async function runStockSync(
  config: SyncConfig,
  options: SyncRunOptions,
  deps: SyncRunDependencies = {}
): Promise<ChannelSyncResult[]> {
  const channels = selectChannels(config, options.channels);
  const fetchSnapshot = deps.fetchSnapshot ?? downloadSnapshot;
  const createClient = deps.createClient ?? createChannelClient;

  const snapshot = await fetchSnapshot(config.archiveUrl);
  const service = new StockSyncService(snapshot.records, deps.now);

  return service.syncChannels(
    channels.map((channel) => createClient(channel)),
    { dryRun: options.dryRun }
  );
}

/**
 * Test the credentials of the selected channels, one after another
 *
 * Rejected credentials yield `connected: false`; any other failure propagates.
 */
export async function checkConnections(
  config: SyncConfig,
  options: SyncRunOptions,
  deps: SyncRunDependencies = {}
): Promise<ConnectionCheckResult[]> {
  const channels = selectChannels(config, options.channels);
  const createClient = deps.createClient ?? createChannelClient;
  const results: ConnectionCheckResult[] = [];

  for (const channel of channels) {
    const client = createClient(channel);
    results.push({ channel: client.channel, connected: await client.testConnection() });
  }

  return results;
}

export function formatConnectionCheck(result: ConnectionCheckResult): string {
  return `${getChannelLabel(result.channel)}: ${result.connected ? 'connected' : 'credentials rejected'}`;
}

/**
 * Human-readable summary lines for one channel
 */
export function formatSyncReport(result: ChannelSyncResult): string[] {
  const mode = result.dryRun ? ' (dry run)' : '';
  return [
    `${getChannelLabel(result.channel)}${mode}`,
    `  Catalog offers:  ${formatCount(result.catalogSize)}`,
    `  Stock updates:   ${formatCount(result.stocks.length)} (${formatCount(result.inStock.length)} in stock) in ${result.stockBatches} batches`,
    `  Price updates:   ${formatCount(result.prices.length)} in ${result.priceBatches} batches`,
    `  Duration:        ${formatDuration(result.durationMs)}`,
  ];
}

/**
 * One-line diagnostic for a failed run
 */
export function describeFailure(error: unknown): string {
  if (error instanceof MarketplaceResponseError) {
    return `Unexpected ${error.marketplace} response: ${error.message}`;
  }
  if (error instanceof MarketplaceApiError) {
    switch (error.code) {
      case 'TIMEOUT':
        return `Request to ${error.marketplace} timed out`;
      case 'NETWORK_ERROR':
        return `Connection error (${error.marketplace}): ${error.message}`;
      default: {
        const status = error.statusCode !== undefined ? ` ${error.statusCode}` : '';
        return `${error.marketplace} API error${status}: ${error.message}`;
      }
    }
  }
  if (error instanceof InventorySnapshotError) {
    return `Inventory snapshot error: ${error.message}`;
  }
  if (error instanceof ConfigError) {
    return `Configuration error: ${error.message}`;
  }
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
