/**
 * Inventory Snapshot Client
 *
 * Downloads the supplier stock archive and parses it in memory.
 */

import { parseInventoryArchive } from './snapshot-parser';
import {
  InventorySnapshotError,
  type InventorySnapshot,
  type SnapshotParseOptions,
} from './types';

export const DEFAULT_ARCHIVE_URL = 'https://timeworld.ru/upload/files/ostatki.zip';

/** Download timeout in milliseconds */
const DOWNLOAD_TIMEOUT = 60000;

export class InventorySnapshotClient {
  private archiveUrl: string;
  private parseOptions: SnapshotParseOptions;

  constructor(archiveUrl: string = DEFAULT_ARCHIVE_URL, parseOptions: SnapshotParseOptions = {}) {
    this.archiveUrl = archiveUrl;
    this.parseOptions = parseOptions;
  }

  /**
   * Download the archive body
   */
  async downloadArchive(): Promise<ArrayBuffer> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), DOWNLOAD_TIMEOUT);

    try {
      const response = await fetch(this.archiveUrl, { signal: controller.signal });
      clearTimeout(timeoutId);

      if (!response.ok) {
        throw new InventorySnapshotError(
          `Snapshot download failed with status ${response.status}`,
          'DOWNLOAD_FAILED',
          response.status
        );
      }

      return await response.arrayBuffer();
    } catch (error) {
      clearTimeout(timeoutId);

      if (error instanceof InventorySnapshotError) {
        throw error;
      }

      if (error instanceof Error && error.name === 'AbortError') {
        throw new InventorySnapshotError('Snapshot download timeout', 'TIMEOUT', 408);
      }

      throw new InventorySnapshotError(
        error instanceof Error ? error.message : 'Unknown error',
        'DOWNLOAD_FAILED'
      );
    }
  }

  /**
   * Download and parse the current snapshot
   */
  async fetchSnapshot(): Promise<InventorySnapshot> {
    console.log(`[InventorySnapshotClient] Downloading ${this.archiveUrl}...`);
    const archive = await this.downloadArchive();

    const snapshot = await parseInventoryArchive(archive, this.parseOptions);

    console.log(
      `[InventorySnapshotClient] Parsed ${snapshot.records.length} records from ${snapshot.fileName} (${snapshot.skippedRows} rows skipped)`
    );
    return snapshot;
  }
}
