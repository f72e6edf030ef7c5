export { InventorySnapshotClient, DEFAULT_ARCHIVE_URL } from './snapshot.client';
export {
  extractWorkbook,
  parseInventoryArchive,
  parseInventoryWorkbook,
  SNAPSHOT_COLUMNS,
  SNAPSHOT_HEADER_ROW,
  type ExtractedWorkbook,
} from './snapshot-parser';
export * from './types';
