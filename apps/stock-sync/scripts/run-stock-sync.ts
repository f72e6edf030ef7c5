/**
 * Sync marketplace stock and prices from the supplier inventory snapshot
 *
 * Usage:
 *   npx tsx scripts/run-stock-sync.ts [options]
 *
 * Options:
 *   --channel=NAME  Only sync this channel (ozon, market-fbs, market-dbs); repeatable
 *   --dry-run       Reconcile and report without submitting updates
 *   --check         Only test each channel's credentials
 */

import { config } from 'dotenv';
import { resolve } from 'path';

// Load environment variables
config({ path: resolve(__dirname, '../.env.local') });

import { loadSyncConfig } from '../src/lib/config/sync.config';
import {
  checkConnections,
  describeFailure,
  formatConnectionCheck,
  formatSyncReport,
  parseSyncArgs,
  runStockSync,
} from '../src/lib/stock-sync';

async function main() {
  console.log('='.repeat(60));
  console.log('Marketplace Stock Sync');
  console.log('='.repeat(60));
  console.log('');

  const options = parseSyncArgs(process.argv.slice(2));
  const syncConfig = loadSyncConfig(process.env);

  if (options.check) {
    const checks = await checkConnections(syncConfig, options);
    for (const check of checks) {
      console.log(formatConnectionCheck(check));
    }
    if (checks.some((check) => !check.connected)) {
      process.exitCode = 1;
    }
    return;
  }

  const results = await runStockSync(syncConfig, options);

  console.log('');
  console.log('=== Sync Complete ===');
  for (const result of results) {
    console.log(formatSyncReport(result).join('\n'));
  }
}

main().catch((error: unknown) => {
  console.error(describeFailure(error));
  process.exitCode = 1;
});
