/**
 * Stock Sync Service
 *
 * Runs the per-channel pipeline: read the channel's offer ids, reconcile them
 * against the inventory snapshot, then submit stock and price updates in
 * batches. Channels run one after another; any failure ends the run, leaving
 * whatever batches were already accepted in place.
 */

import type { ChannelClient } from '@/lib/marketplace/channel-client.interface';
import { chunk, countChunks } from '@/lib/utils/chunk';
import { buildPriceUpdates, buildStockUpdates, filterInStock } from './reconciliation';
import type {
  ChannelSyncOptions,
  ChannelSyncResult,
  InventoryRecord,
  PriceUpdate,
  StockUpdate,
} from './stock-sync.types';

export class StockSyncService {
  private records: InventoryRecord[];
  private now: () => Date;

  /**
   * @param records Inventory snapshot shared by every channel of the run
   * @param now Clock used for stock update timestamps
   */
  constructor(records: InventoryRecord[], now: () => Date = () => new Date()) {
    this.records = records;
    this.now = now;
  }

  /**
   * Submit stock updates in batches of the channel's stock limit
   *
   * @returns One acknowledgement per batch
   */
  async uploadStocks(client: ChannelClient, stocks: StockUpdate[]): Promise<unknown[]> {
    const acknowledgements: unknown[] = [];
    const total = countChunks(stocks.length, client.batchLimits.stocks);
    let batchNumber = 0;

    for (const batch of chunk(stocks, client.batchLimits.stocks)) {
      batchNumber++;
      console.log(
        `[StockSyncService] ${client.channel}: stock batch ${batchNumber}/${total} (${batch.length} items)`
      );
      acknowledgements.push(await client.updateStocks(batch));
    }

    return acknowledgements;
  }

  /**
   * Submit price updates in batches of the channel's price limit
   *
   * @returns One acknowledgement per batch
   */
  async uploadPrices(client: ChannelClient, prices: PriceUpdate[]): Promise<unknown[]> {
    const acknowledgements: unknown[] = [];
    const total = countChunks(prices.length, client.batchLimits.prices);
    let batchNumber = 0;

    for (const batch of chunk(prices, client.batchLimits.prices)) {
      batchNumber++;
      console.log(
        `[StockSyncService] ${client.channel}: price batch ${batchNumber}/${total} (${batch.length} items)`
      );
      acknowledgements.push(await client.updatePrices(batch));
    }

    return acknowledgements;
  }

  /**
   * Sync one channel: stocks first, then prices
   */
  async syncChannel(
    client: ChannelClient,
    options: ChannelSyncOptions = {}
  ): Promise<ChannelSyncResult> {
    const startedAt = Date.now();
    const dryRun = options.dryRun ?? false;

    console.log(`[StockSyncService] Syncing ${client.channel}...`);

    const offerIds = await client.getOfferIds();
    const stocks = buildStockUpdates(this.records, offerIds, client.warehouseId, this.now());
    const prices = buildPriceUpdates(this.records, offerIds, client.currencyCode);

    const acknowledgements: unknown[] = [];
    if (dryRun) {
      console.log(`[StockSyncService] ${client.channel}: dry run, nothing submitted`);
    } else {
      acknowledgements.push(...(await this.uploadStocks(client, stocks)));
      acknowledgements.push(...(await this.uploadPrices(client, prices)));
    }

    const result: ChannelSyncResult = {
      channel: client.channel,
      catalogSize: offerIds.size,
      stocks,
      inStock: filterInStock(stocks),
      prices,
      stockBatches: countChunks(stocks.length, client.batchLimits.stocks),
      priceBatches: countChunks(prices.length, client.batchLimits.prices),
      acknowledgements,
      dryRun,
      durationMs: Date.now() - startedAt,
    };

    console.log(
      `[StockSyncService] ${client.channel} complete: ${result.stocks.length} stocks (${result.inStock.length} in stock), ${result.prices.length} prices`
    );
    return result;
  }

  /**
   * Sync channels in order, stopping at the first failure
   */
  async syncChannels(
    clients: ChannelClient[],
    options: ChannelSyncOptions = {}
  ): Promise<ChannelSyncResult[]> {
    const results: ChannelSyncResult[] = [];

    for (const client of clients) {
      results.push(await this.syncChannel(client, options));
    }

    return results;
  }
}
