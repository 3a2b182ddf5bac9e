export { default as logger } from './logger';
export { AppError } from './AppError';
export type { AppErrorCode } from './AppError';
export { loadInventoryFile, parseInventoryCsv, parseInventoryRow, INVENTORY_COLUMNS } from './csv';
export type { InventoryLoadResult, SkippedRow, RowParseResult } from './csv';
