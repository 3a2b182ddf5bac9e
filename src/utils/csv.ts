/**
 * Inventory CSV Loading
 *
 * Streams an inventory spreadsheet export through csv-parse and turns each
 * row into an InventoryItem, in file order.
 *
 * Key features:
 * - Header names are whitespace-normalized ("Manufacturer\nPart" → "Manufacturer Part")
 * - Recognized columns are matched case-insensitively; every column is kept
 *   in the item's attribute map
 * - Row validation with zod; invalid rows are skipped and reported
 */

import { createReadStream } from 'fs';
import { access } from 'fs/promises';
import { Readable } from 'stream';
import { parse } from 'csv-parse';
import { z } from 'zod';
import { createInventoryItem } from '../matching/models';
import type { InventoryItem } from '../matching/types';
import { AppError } from './AppError';
import logger from './logger';

// ============================================
// Types
// ============================================

export interface SkippedRow {
  /** 1-based data row number (the header row is not counted) */
  rowNumber: number;
  error: string;
}

export interface InventoryLoadResult {
  items: InventoryItem[];
  skipped: SkippedRow[];
  /** Normalized header names, in file order */
  fields: string[];
}

/**
 * Recognized inventory columns
 */
export const INVENTORY_COLUMNS = [
  'IPN',
  'Category',
  'Value',
  'Package',
  'Tolerance',
  'V',
  'A',
  'W',
  'Manufacturer',
  'MFGPN',
  'LCSC',
  'Description',
  'Datasheet',
  'SMD',
  'Priority',
] as const;

export type InventoryColumn = (typeof INVENTORY_COLUMNS)[number];

const REQUIRED_COLUMNS: readonly InventoryColumn[] = ['IPN'];

const optionalField = z.string().trim().default('');

const inventoryRowSchema = z.object({
  IPN: z.string({ required_error: 'IPN is required' }).trim().min(1, 'IPN is required'),
  Category: optionalField,
  Value: optionalField,
  Package: optionalField,
  Tolerance: optionalField,
  V: optionalField,
  A: optionalField,
  W: optionalField,
  Manufacturer: optionalField,
  MFGPN: optionalField,
  LCSC: optionalField,
  Description: optionalField,
  Datasheet: optionalField,
  SMD: optionalField,
  Priority: optionalField,
});

const rawRecordSchema = z.record(z.string());

// ============================================
// Header and row handling
// ============================================

/**
 * Collapses whitespace runs (including embedded newlines) to one space.
 */
export function normalizeHeader(header: string): string {
  return header.replace(/\s+/g, ' ').trim();
}

/**
 * Returns the required columns absent from a header row (case-insensitive).
 */
export function findMissingColumns(headers: readonly string[]): InventoryColumn[] {
  const present = new Set(headers.map((header) => normalizeHeader(header).toUpperCase()));
  return REQUIRED_COLUMNS.filter((column) => !present.has(column.toUpperCase()));
}

function pickRecognizedColumns(record: Readonly<Record<string, string>>): Partial<Record<InventoryColumn, string>> {
  const byUpper = new Map(Object.entries(record).map(([key, value]) => [key.toUpperCase(), value]));
  const picked: Partial<Record<InventoryColumn, string>> = {};
  for (const column of INVENTORY_COLUMNS) {
    const value = byUpper.get(column.toUpperCase());
    if (value !== undefined) picked[column] = value;
  }
  return picked;
}

function describeIssues(error: z.ZodError): string {
  return error.errors.map((issue) => `${issue.path.join('.') || 'row'}: ${issue.message}`).join('; ');
}

export type RowParseResult =
  | { success: true; item: InventoryItem; rowNumber: number }
  | { success: false; error: string; rowNumber: number };

/**
 * Validates one record (keyed by normalized header) into an InventoryItem.
 */
export function parseInventoryRow(record: unknown, rowNumber: number): RowParseResult {
  const raw = rawRecordSchema.safeParse(record);
  if (!raw.success) {
    return { success: false, error: describeIssues(raw.error), rowNumber };
  }

  const row = inventoryRowSchema.safeParse(pickRecognizedColumns(raw.data));
  if (!row.success) {
    return { success: false, error: describeIssues(row.error), rowNumber };
  }

  const fields = row.data;
  return {
    success: true,
    rowNumber,
    item: createInventoryItem({
      ipn: fields.IPN,
      category: fields.Category,
      value: fields.Value,
      package: fields.Package,
      tolerance: fields.Tolerance,
      voltage: fields.V,
      amperage: fields.A,
      wattage: fields.W,
      manufacturer: fields.Manufacturer,
      manufacturerPartNumber: fields.MFGPN,
      distributorId: fields.LCSC,
      description: fields.Description,
      smd: fields.SMD,
      priority: fields.Priority,
      attributes: raw.data,
    }),
  };
}

// ============================================
// Streaming loader
// ============================================

async function readInventory(input: Readable, source: string): Promise<InventoryLoadResult> {
  let fields: string[] = [];
  const parser = input.pipe(
    parse({
      bom: true,
      columns: (headers: string[]) => {
        fields = headers.map(normalizeHeader);
        return fields;
      },
      skip_empty_lines: true,
      relax_column_count: true,
      trim: true,
    })
  );

  const items: InventoryItem[] = [];
  const skipped: SkippedRow[] = [];
  let rowNumber = 0;
  let headersChecked = false;

  const checkHeaders = (): void => {
    const missing = findMissingColumns(fields);
    if (missing.length > 0) {
      throw AppError.invalidInput(`Inventory ${source} is missing required columns: ${missing.join(', ')}`);
    }
    headersChecked = true;
  };

  try {
    for await (const record of parser) {
      if (!headersChecked) checkHeaders();

      rowNumber++;
      const result = parseInventoryRow(record, rowNumber);
      if (result.success) {
        items.push(result.item);
      } else {
        skipped.push({ rowNumber: result.rowNumber, error: result.error });
        logger.warn(`Skipping inventory row ${result.rowNumber}: ${result.error}`);
      }
    }
  } catch (error) {
    if (error instanceof AppError) throw error;
    const message = error instanceof Error ? error.message : String(error);
    throw AppError.invalidInput(`Malformed inventory CSV ${source}: ${message}`);
  }

  if (!headersChecked) checkHeaders();

  logger.info(`Loaded ${items.length} inventory items from ${source} (${skipped.length} skipped)`);
  return { items, skipped, fields };
}

/**
 * Parses inventory CSV text.
 *
 * @throws AppError INVALID_INPUT when the IPN column is missing or the CSV is malformed
 */
export async function parseInventoryCsv(text: string): Promise<InventoryLoadResult> {
  return readInventory(Readable.from([text]), 'text');
}

/**
 * Loads an inventory CSV file.
 *
 * @throws AppError NOT_FOUND when the file does not exist
 * @throws AppError INVALID_INPUT when the IPN column is missing or the CSV is malformed
 *
 * @example
 * const { items, skipped } = await loadInventoryFile('inventory.csv');
 * const engine = new MatchEngine(items);
 */
export async function loadInventoryFile(filePath: string): Promise<InventoryLoadResult> {
  try {
    await access(filePath);
  } catch {
    throw AppError.notFound(`Inventory file not found: ${filePath}`);
  }
  return readInventory(createReadStream(filePath), filePath);
}

export default {
  loadInventoryFile,
  parseInventoryCsv,
  parseInventoryRow,
  findMissingColumns,
  normalizeHeader,
};
