import { describe, it, expect, vi } from 'vitest';
import { ConfigError, type ChannelConfig, type SyncConfig } from '@/lib/config/sync.config';
import { InventorySnapshotError, type InventorySnapshot } from '@/lib/inventory-snapshot/types';
import type { ChannelClient } from '@/lib/marketplace/channel-client.interface';
import { MarketplaceApiError, MarketplaceResponseError } from '@/lib/marketplace/errors';
import { OzonClient } from '@/lib/ozon/client';
import { YandexMarketClient } from '@/lib/yandex-market/client';
import { createChannelClient } from '../channel-client.factory';
import {
  checkConnections,
  describeFailure,
  formatConnectionCheck,
  formatSyncReport,
  parseSyncArgs,
  runStockSync,
} from '../stock-sync.runner';
import type { ChannelSyncResult } from '../stock-sync.types';

// Suppress console logs during tests
vi.spyOn(console, 'log').mockImplementation(() => {});

const ozonConfig: ChannelConfig = {
  channel: 'ozon',
  credentials: { clientId: 'test-client-id', sellerToken: 'test-seller-token' },
  batchLimits: {},
};

const fbsConfig: ChannelConfig = {
  channel: 'market-fbs',
  placement: 'FBS',
  credentials: { accessToken: 'test-token', campaignId: '1001', warehouseId: 'WH-FBS' },
  batchLimits: { stocks: 50 },
};

const syncConfig: SyncConfig = {
  archiveUrl: 'https://example.test/stock.zip',
  channels: [ozonConfig, fbsConfig],
};

const snapshot: InventorySnapshot = {
  records: [{ identifier: 'A', quantityDescriptor: '>10', priceText: "5'990.00 руб." }],
  fileName: 'stock.xlsx',
  sheetName: 'Остатки',
  totalRows: 1,
  skippedRows: 0,
};

function createStubClient(config: ChannelConfig, offerIds: string[]): ChannelClient {
  return {
    channel: config.channel,
    marketplace: config.channel === 'ozon' ? 'ozon' : 'yandex-market',
    warehouseId: config.channel === 'ozon' ? null : config.credentials.warehouseId,
    currencyCode: 'RUB',
    batchLimits: { stocks: 100, prices: 100 },
    testConnection: vi.fn().mockResolvedValue(true),
    getOfferIds: vi.fn().mockResolvedValue(new Set(offerIds)),
    updateStocks: vi.fn().mockResolvedValue({ result: [] }),
    updatePrices: vi.fn().mockResolvedValue({ result: [] }),
  };
}

describe('Stock sync runner', () => {
  describe('parseSyncArgs', () => {
    it('should default to every channel, submitting updates', () => {
      expect(parseSyncArgs([])).toEqual({ channels: [], dryRun: false, check: false });
    });

    it('should collect channels and the dry-run flag', () => {
      expect(
        parseSyncArgs(['--channel=market-dbs', '--dry-run', '--channel=ozon', '--channel=ozon'])
      ).toEqual({ channels: ['market-dbs', 'ozon'], dryRun: true, check: false });
    });

    it('should parse the connection check flag', () => {
      expect(parseSyncArgs(['--check', '--channel=ozon'])).toEqual({
        channels: ['ozon'],
        dryRun: false,
        check: true,
      });
    });

    it('should reject unknown channels and flags', () => {
      expect(() => parseSyncArgs(['--channel=wildberries'])).toThrow('Unknown channel: wildberries');
      expect(() => parseSyncArgs(['--force'])).toThrow(ConfigError);
    });
  });

  describe('createChannelClient', () => {
    it('should create an Ozon client for the ozon channel', () => {
      const client = createChannelClient(ozonConfig);

      expect(client).toBeInstanceOf(OzonClient);
      expect(client.batchLimits).toEqual({ stocks: 100, prices: 900 });
    });

    it('should create a Yandex Market client with overrides applied', () => {
      const client = createChannelClient(fbsConfig);

      expect(client).toBeInstanceOf(YandexMarketClient);
      expect(client.channel).toBe('market-fbs');
      expect(client.warehouseId).toBe('WH-FBS');
      expect(client.batchLimits).toEqual({ stocks: 50, prices: 500 });
    });

    it('should return a new instance on every call', () => {
      expect(createChannelClient(ozonConfig)).not.toBe(createChannelClient(ozonConfig));
    });
  });

  describe('runStockSync', () => {
    it('should download the snapshot once and sync every configured channel', async () => {
      const fetchSnapshot = vi.fn().mockResolvedValue(snapshot);
      const clients: ChannelClient[] = [];
      const createClient = (config: ChannelConfig) => {
        const client = createStubClient(config, ['A', 'B']);
        clients.push(client);
        return client;
      };

      const results = await runStockSync(
        syncConfig,
        { channels: [], dryRun: false, check: false },
        { fetchSnapshot, createClient, now: () => new Date('2026-10-19T00:00:00Z') }
      );

      expect(fetchSnapshot).toHaveBeenCalledTimes(1);
      expect(fetchSnapshot).toHaveBeenCalledWith('https://example.test/stock.zip');
      expect(results.map((r) => r.channel)).toEqual(['ozon', 'market-fbs']);
      expect(clients[1].updateStocks).toHaveBeenCalledWith([
        { identifier: 'A', quantity: 100, timestamp: '2026-10-19T00:00:00Z', warehouseId: 'WH-FBS' },
        { identifier: 'B', quantity: 0, timestamp: '2026-10-19T00:00:00Z', warehouseId: 'WH-FBS' },
      ]);
    });

    it('should sync only the requested channels', async () => {
      const createClient = vi.fn((config: ChannelConfig) => createStubClient(config, []));

      const results = await runStockSync(
        syncConfig,
        { channels: ['market-fbs'], dryRun: true, check: false },
        { fetchSnapshot: vi.fn().mockResolvedValue(snapshot), createClient }
      );

      expect(createClient).toHaveBeenCalledTimes(1);
      expect(results).toHaveLength(1);
      expect(results[0].channel).toBe('market-fbs');
      expect(results[0].dryRun).toBe(true);
    });

    it('should fail before downloading when a requested channel is not configured', async () => {
      const fetchSnapshot = vi.fn().mockResolvedValue(snapshot);

      await expect(
        runStockSync(
          syncConfig,
          { channels: ['market-dbs'], dryRun: false, check: false },
          { fetchSnapshot }
        )
      ).rejects.toThrow('Channel not configured: market-dbs');
      expect(fetchSnapshot).not.toHaveBeenCalled();
    });
  });

  describe('checkConnections', () => {
    it('should test every selected channel without touching the catalog', async () => {
      const clients: ChannelClient[] = [];
      const createClient = (config: ChannelConfig) => {
        const client = createStubClient(config, ['A']);
        if (config.channel === 'market-fbs') {
          client.testConnection = vi.fn().mockResolvedValue(false);
        }
        clients.push(client);
        return client;
      };

      const results = await checkConnections(
        syncConfig,
        { channels: [], dryRun: false, check: true },
        { createClient }
      );

      expect(results).toEqual([
        { channel: 'ozon', connected: true },
        { channel: 'market-fbs', connected: false },
      ]);
      expect(clients[0].getOfferIds).not.toHaveBeenCalled();
      expect(clients[1].updateStocks).not.toHaveBeenCalled();
    });

    it('should propagate failures other than rejected credentials', async () => {
      const createClient = (config: ChannelConfig) => {
        const client = createStubClient(config, []);
        client.testConnection = vi
          .fn()
          .mockRejectedValue(new MarketplaceApiError('Bad gateway', 'ozon', 'API_ERROR', 502));
        return client;
      };

      await expect(
        checkConnections(syncConfig, { channels: ['ozon'], dryRun: false, check: true }, { createClient })
      ).rejects.toThrow('Bad gateway');
    });

    it('should format one line per channel', () => {
      expect(formatConnectionCheck({ channel: 'ozon', connected: true })).toBe('Ozon: connected');
      expect(formatConnectionCheck({ channel: 'market-dbs', connected: false })).toBe(
        'Yandex Market DBS: credentials rejected'
      );
    });
  });

  describe('formatSyncReport', () => {
    it('should summarise a channel result', () => {
      const result: ChannelSyncResult = {
        channel: 'market-dbs',
        catalogSize: 2500,
        stocks: Array.from({ length: 2500 }, (_, i) => ({
          identifier: `SKU-${i}`,
          quantity: i < 1200 ? 5 : 0,
          timestamp: '2026-10-19T00:00:00Z',
          warehouseId: 'WH-DBS',
        })),
        inStock: [],
        prices: [],
        stockBatches: 2,
        priceBatches: 0,
        acknowledgements: [],
        dryRun: false,
        durationMs: 12345,
      };
      result.inStock = result.stocks.filter((s) => s.quantity !== 0);

      expect(formatSyncReport(result)).toEqual([
        'Yandex Market DBS',
        '  Catalog offers:  2,500',
        '  Stock updates:   2,500 (1,200 in stock) in 2 batches',
        '  Price updates:   0 in 0 batches',
        '  Duration:        12.3s',
      ]);
    });

    it('should mark dry runs', () => {
      const result: ChannelSyncResult = {
        channel: 'ozon',
        catalogSize: 0,
        stocks: [],
        inStock: [],
        prices: [],
        stockBatches: 0,
        priceBatches: 0,
        acknowledgements: [],
        dryRun: true,
        durationMs: 50,
      };

      expect(formatSyncReport(result)[0]).toBe('Ozon (dry run)');
    });
  });

  describe('describeFailure', () => {
    it('should describe timeouts and connection errors', () => {
      expect(
        describeFailure(new MarketplaceApiError('Request timeout', 'ozon', 'TIMEOUT', 408))
      ).toBe('Request to ozon timed out');
      expect(
        describeFailure(new MarketplaceApiError('fetch failed', 'yandex-market', 'NETWORK_ERROR'))
      ).toBe('Connection error (yandex-market): fetch failed');
    });

    it('should describe API errors with their status', () => {
      expect(
        describeFailure(new MarketplaceApiError('Invalid Api-Key', 'ozon', 'API_ERROR', 403))
      ).toBe('ozon API error 403: Invalid Api-Key');
    });

    it('should describe malformed responses', () => {
      expect(
        describeFailure(new MarketplaceResponseError('Unexpected product list response', 'ozon'))
      ).toBe('Unexpected ozon response: Unexpected product list response');
    });

    it('should describe snapshot, config and other errors', () => {
      expect(
        describeFailure(new InventorySnapshotError('Archive contains no spreadsheet', 'NO_WORKBOOK'))
      ).toBe('Inventory snapshot error: Archive contains no spreadsheet');
      expect(describeFailure(new ConfigError('No channel configured'))).toBe(
        'Configuration error: No channel configured'
      );
      expect(describeFailure(new TypeError('boom'))).toBe('TypeError: boom');
      expect(describeFailure('plain')).toBe('plain');
    });
  });
});
