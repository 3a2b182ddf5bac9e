/**
 * partmatch
 *
 * Matches schematic components against a parts inventory and builds
 * bill-of-materials rows from the results.
 *
 * Usage:
 * ```typescript
 * import { MatchEngine, loadInventoryFile, buildBomEntries } from 'partmatch';
 *
 * const { items } = await loadInventoryFile('inventory.csv');
 * const engine = new MatchEngine(items, { verbose: true });
 * const rows = buildBomEntries(engine.groupAndMatch(components), { verbose: true });
 * ```
 */

export * from './matching';
export { loadInventoryFile, parseInventoryCsv, parseInventoryRow, INVENTORY_COLUMNS, AppError } from './utils';
export type { InventoryLoadResult, SkippedRow, RowParseResult, AppErrorCode } from './utils';
export { buildBomEntries, collectDiagnostics, compareBomEntries, bomService } from './services';
export type { BomEntry, BomOptions } from './services';
export { loadEnv } from './config';
export type { Env } from './config';
