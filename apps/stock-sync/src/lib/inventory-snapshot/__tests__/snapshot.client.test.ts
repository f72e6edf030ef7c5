/**
 * Tests for InventorySnapshotClient
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { DEFAULT_ARCHIVE_URL, InventorySnapshotClient } from '../snapshot.client';
import { InventorySnapshotError } from '../types';
import { buildArchive, buildWorkbook, supplierRows } from './snapshot-fixtures';

// Mock the global fetch
const mockFetch = vi.fn();

// Suppress console logs during tests
vi.spyOn(console, 'log').mockImplementation(() => {});

const ARCHIVE_URL = 'https://supplier.example.com/stock.zip';

function createArchiveResponse(body: Uint8Array, ok: boolean = true, status: number = 200) {
  return {
    ok,
    status,
    arrayBuffer: () => Promise.resolve(body),
  };
}

describe('InventorySnapshotClient', () => {
  beforeEach(() => {
    mockFetch.mockReset();
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('fetchSnapshot', () => {
    it('should download and parse the archive', async () => {
      const archive = await buildArchive({
        'ostatki.xlsx': buildWorkbook(
          supplierRows([
            [1, 'TW-001', 'Casio A158', '>10', "5'990.00 руб."],
            [2, '', 'Ремешки', '', ''],
          ])
        ),
      });
      mockFetch.mockResolvedValueOnce(createArchiveResponse(archive));

      const snapshot = await new InventorySnapshotClient(ARCHIVE_URL).fetchSnapshot();

      expect(mockFetch.mock.calls[0][0]).toBe(ARCHIVE_URL);
      expect(snapshot.records).toEqual([
        { identifier: 'TW-001', quantityDescriptor: '>10', priceText: "5'990.00 руб." },
      ]);
      expect(snapshot.skippedRows).toBe(1);
    });

    it('should use the default supplier URL', async () => {
      const archive = await buildArchive({
        'ostatki.xlsx': buildWorkbook(supplierRows([[1, 'TW-001', 'Casio', '2', '990']])),
      });
      mockFetch.mockResolvedValueOnce(createArchiveResponse(archive));

      await new InventorySnapshotClient().fetchSnapshot();

      expect(mockFetch.mock.calls[0][0]).toBe(DEFAULT_ARCHIVE_URL);
    });

    it('should pass parse options through', async () => {
      const archive = await buildArchive({
        'stock.xlsx': buildWorkbook([
          ['Код', 'Количество', 'Цена'],
          ['TW-001', '3', '1500'],
        ]),
      });
      mockFetch.mockResolvedValueOnce(createArchiveResponse(archive));

      const snapshot = await new InventorySnapshotClient(ARCHIVE_URL, { headerRow: 0 }).fetchSnapshot();

      expect(snapshot.records).toEqual([
        { identifier: 'TW-001', quantityDescriptor: '3', priceText: '1500' },
      ]);
    });
  });

  describe('downloadArchive', () => {
    it('should throw DOWNLOAD_FAILED with the status on a non-2xx response', async () => {
      mockFetch.mockResolvedValueOnce(createArchiveResponse(new Uint8Array(), false, 404));

      const error = await new InventorySnapshotClient(ARCHIVE_URL)
        .downloadArchive()
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(InventorySnapshotError);
      expect(error).toMatchObject({
        code: 'DOWNLOAD_FAILED',
        statusCode: 404,
        message: 'Snapshot download failed with status 404',
      });
    });

    it('should map an aborted download to TIMEOUT', async () => {
      const abortError = new Error('This operation was aborted');
      abortError.name = 'AbortError';
      mockFetch.mockRejectedValueOnce(abortError);

      await expect(new InventorySnapshotClient(ARCHIVE_URL).downloadArchive()).rejects.toMatchObject({
        code: 'TIMEOUT',
        statusCode: 408,
      });
    });

    it('should map connection failures to DOWNLOAD_FAILED', async () => {
      mockFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

      await expect(new InventorySnapshotClient(ARCHIVE_URL).downloadArchive()).rejects.toMatchObject({
        code: 'DOWNLOAD_FAILED',
        message: 'fetch failed',
      });
    });
  });
});
