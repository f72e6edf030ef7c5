/**
 * Inventory Snapshot Types
 */

import type { InventoryRecord } from '@/lib/stock-sync/stock-sync.types';

export type InventorySnapshotErrorCode =
  | 'DOWNLOAD_FAILED'
  | 'TIMEOUT'
  | 'NO_WORKBOOK'
  | 'MISSING_HEADER'
  | 'MISSING_COLUMNS';

/**
 * Error class for snapshot download and parsing failures
 */
export class InventorySnapshotError extends Error {
  constructor(
    message: string,
    public readonly code: InventorySnapshotErrorCode,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'InventorySnapshotError';
  }
}

/**
 * Column headers of the supplier stock sheet
 */
export interface SnapshotColumns {
  identifier: string;
  quantity: string;
  price: string;
}

export interface SnapshotParseOptions {
  /** 0-based index of the header row */
  headerRow?: number;
  columns?: Partial<SnapshotColumns>;
}

/**
 * Parsed snapshot with metadata
 */
export interface InventorySnapshot {
  records: InventoryRecord[];
  fileName: string;
  sheetName: string;
  totalRows: number;
  /** Rows without a product code */
  skippedRows: number;
}
