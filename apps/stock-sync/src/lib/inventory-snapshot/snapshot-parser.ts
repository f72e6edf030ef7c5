/**
 * Inventory Snapshot Parser
 *
 * The supplier publishes a zip archive holding one spreadsheet. The first
 * sheet has a free-form preamble; the table header sits on row 17 (0-based)
 * with the columns "Код" (product code), "Количество" (quantity) and
 * "Цена" (price), among others.
 */

import JSZip from 'jszip';
import * as XLSX from 'xlsx';
import type { InventoryRecord } from '@/lib/stock-sync/stock-sync.types';
import {
  InventorySnapshotError,
  type InventorySnapshot,
  type SnapshotColumns,
  type SnapshotParseOptions,
} from './types';

/** 0-based index of the header row in the supplier sheet */
export const SNAPSHOT_HEADER_ROW = 17;

export const SNAPSHOT_COLUMNS: SnapshotColumns = {
  identifier: 'Код',
  quantity: 'Количество',
  price: 'Цена',
};

const WORKBOOK_EXTENSIONS = /\.(xls|xlsx)$/i;

/**
 * Workbook file pulled out of the archive
 */
export interface ExtractedWorkbook {
  fileName: string;
  data: Uint8Array;
}

/**
 * Find the first spreadsheet in a zip archive and read it into memory
 */
export async function extractWorkbook(archive: ArrayBuffer | Uint8Array): Promise<ExtractedWorkbook> {
  const zip = await JSZip.loadAsync(archive);
  const entry = Object.values(zip.files).find(
    (file) => !file.dir && WORKBOOK_EXTENSIONS.test(file.name)
  );

  if (!entry) {
    throw new InventorySnapshotError('Archive contains no spreadsheet', 'NO_WORKBOOK');
  }

  return {
    fileName: entry.name,
    data: await entry.async('uint8array'),
  };
}

/**
 * Cell text as shown in the sheet; empty cells become ''
 */
function cellText(value: unknown): string {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number') return String(value);
  return '';
}

/**
 * Parse the first sheet of the supplier workbook into inventory records
 */
export function parseInventoryWorkbook(
  data: Uint8Array,
  fileName: string,
  options: SnapshotParseOptions = {}
): InventorySnapshot {
  const headerRow = options.headerRow ?? SNAPSHOT_HEADER_ROW;
  const columns: SnapshotColumns = { ...SNAPSHOT_COLUMNS, ...options.columns };

  const workbook = XLSX.read(data, { type: 'array' });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;

  if (!sheetName || !sheet) {
    throw new InventorySnapshotError(`${fileName} has no sheets`, 'MISSING_HEADER');
  }

  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    range: headerRow,
    raw: false,
    defval: '',
    blankrows: false,
  });

  const [header, ...dataRows] = rows;
  if (!header) {
    throw new InventorySnapshotError(
      `${fileName} has no header row at row ${headerRow}`,
      'MISSING_HEADER'
    );
  }

  // Build column index map
  const columnMap = new Map<string, number>();
  header.forEach((name, index) => {
    const key = cellText(name);
    if (key && !columnMap.has(key)) {
      columnMap.set(key, index);
    }
  });

  const missing = Object.values(columns).filter((name) => !columnMap.has(name));
  if (missing.length > 0) {
    throw new InventorySnapshotError(
      `Missing required columns: ${missing.join(', ')}`,
      'MISSING_COLUMNS'
    );
  }

  const getColumn = (row: unknown[], columnName: string): string => {
    const index = columnMap.get(columnName);
    return index !== undefined ? cellText(row[index]) : '';
  };

  const records: InventoryRecord[] = [];
  let skippedRows = 0;

  for (const row of dataRows) {
    const identifier = getColumn(row, columns.identifier);
    if (!identifier) {
      skippedRows++;
      continue;
    }
    records.push({
      identifier,
      quantityDescriptor: getColumn(row, columns.quantity),
      priceText: getColumn(row, columns.price),
    });
  }

  return {
    records,
    fileName,
    sheetName,
    totalRows: dataRows.length,
    skippedRows,
  };
}

/**
 * Unzip the supplier archive and parse its spreadsheet
 */
export async function parseInventoryArchive(
  archive: ArrayBuffer | Uint8Array,
  options: SnapshotParseOptions = {}
): Promise<InventorySnapshot> {
  const workbook = await extractWorkbook(archive);
  return parseInventoryWorkbook(workbook.data, workbook.fileName, options);
}
