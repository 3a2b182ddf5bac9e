/**
 * BOM Entry Service
 *
 * Turns grouped match results into bill-of-materials rows.
 *
 * ROW RULES:
 * 1. One row per group: joined references, quantity, display value, best item
 * 2. Verbose mode adds an "ALT: <refs>" row per tied alternate
 * 3. Unmatched groups get a "No match" row; debug mode appends the terse diagnostic
 * 4. Rows sort by reference prefix, lowest reference number, main rows
 *    before alternates, then reference text
 */

import { renderDiagnostic } from '../matching/diagnosticAnalyzer';
import { lookupProperty } from '../matching/categoryProperties';
import type { Diagnostic, GroupedResults, InventoryItem, MatchGroup, MatchResult } from '../matching/types';
import { formatValueForDisplay } from '../matching/valueParser';
import logger from '../utils/logger';

// ============================================
// Types
// ============================================

export interface BomEntry {
  /** Comma-separated references, prefixed "ALT: " for alternates */
  reference: string;
  quantity: number;
  value: string;
  footprint: string;
  ipn: string;
  manufacturer: string;
  manufacturerPartNumber: string;
  distributorId: string;
  description: string;
  datasheet: string;
  /** Surface-mount marker of the chosen item */
  smd: string;
  /** "Score: N", or "No match" */
  matchQuality: string;
  notes: string;
  /** Priority of the chosen item; null when unmatched */
  priority: number | null;
}

export interface BomOptions {
  /** Emit rows for tied alternates */
  verbose?: boolean;
  /** Append diagnostics to unmatched rows */
  debug?: boolean;
}

export const ALTERNATE_PREFIX = 'ALT: ';
export const NO_MATCH_NOTE = 'No inventory match found';

// ============================================
// Row building
// ============================================

function itemColumns(item: InventoryItem): Pick<
  BomEntry,
  'ipn' | 'manufacturer' | 'manufacturerPartNumber' | 'distributorId' | 'description' | 'datasheet' | 'smd' | 'priority'
> {
  return {
    ipn: item.ipn,
    manufacturer: item.manufacturer,
    manufacturerPartNumber: item.manufacturerPartNumber,
    distributorId: item.distributorId,
    description: item.description,
    datasheet: lookupProperty(item.attributes, 'datasheet') ?? '',
    smd: item.smd,
    priority: item.priority,
  };
}

function matchedRow(group: MatchGroup, references: string, match: MatchResult, notes: string): BomEntry {
  return {
    reference: references,
    quantity: group.components.length,
    value: formatValueForDisplay(group.report.annotated),
    footprint: group.report.annotated.component.footprint,
    ...itemColumns(match.item),
    matchQuality: `Score: ${match.score}`,
    notes,
  };
}

function groupRows(group: MatchGroup, options: BomOptions): BomEntry[] {
  const { report } = group;
  const references = group.components.map((component) => component.reference).join(', ');

  if (!report.best) {
    const diagnostic = options.debug && report.diagnostic ? `; ${renderDiagnostic(report.diagnostic, 'terse')}` : '';
    return [
      {
        reference: references,
        quantity: group.components.length,
        value: formatValueForDisplay(report.annotated),
        footprint: report.annotated.component.footprint,
        ipn: '',
        manufacturer: '',
        manufacturerPartNumber: '',
        distributorId: '',
        description: '',
        datasheet: '',
        smd: '',
        matchQuality: 'No match',
        notes: `${NO_MATCH_NOTE}${diagnostic}`,
        priority: null,
      },
    ];
  }

  const notes = [...report.notes, ...report.warnings.map((warning) => warning.message)].join('; ');
  const rows = [matchedRow(group, references, report.best, notes)];

  if (options.verbose) {
    for (const alternate of report.alternates) {
      rows.push(matchedRow(group, `${ALTERNATE_PREFIX}${references}`, alternate, 'Alternative match'));
    }
  }
  return rows;
}

// ============================================
// Ordering
// ============================================

interface BomSortKey {
  prefix: string;
  number: number;
  alternate: boolean;
  reference: string;
}

/**
 * "R10" → { prefix: "R", number: 10 }; non-standard references have no number.
 */
export function parseReference(reference: string): { prefix: string; number: number | null } {
  const match = /^([A-Za-z]+)(\d+)$/.exec(reference.trim());
  if (match) return { prefix: match[1].toUpperCase(), number: Number(match[2]) };

  const prefix = /^([A-Za-z]+)/.exec(reference.trim());
  return { prefix: prefix ? prefix[1].toUpperCase() : '', number: null };
}

function sortKey(entry: BomEntry): BomSortKey {
  const alternate = entry.reference.startsWith(ALTERNATE_PREFIX);
  const references = (alternate ? entry.reference.slice(ALTERNATE_PREFIX.length) : entry.reference).split(', ');

  const prefixes = new Set<string>();
  let lowest: number | null = null;
  for (const reference of references) {
    const parsed = parseReference(reference);
    if (parsed.prefix) prefixes.add(parsed.prefix);
    if (parsed.number !== null && (lowest === null || parsed.number < lowest)) lowest = parsed.number;
  }

  return {
    prefix: [...prefixes].sort()[0] ?? 'Z',
    number: lowest ?? 0,
    alternate,
    reference: entry.reference,
  };
}

function compareText(left: string, right: string): number {
  if (left < right) return -1;
  return left > right ? 1 : 0;
}

export function compareBomEntries(left: BomEntry, right: BomEntry): number {
  const a = sortKey(left);
  const b = sortKey(right);
  return (
    compareText(a.prefix, b.prefix) ||
    a.number - b.number ||
    Number(a.alternate) - Number(b.alternate) ||
    compareText(a.reference, b.reference)
  );
}

// ============================================
// Public API
// ============================================

/**
 * Builds sorted BOM rows from grouped match results.
 *
 * @example
 * const groups = engine.groupAndMatch(components);
 * const rows = buildBomEntries(groups, { verbose: true });
 */
export function buildBomEntries(groups: GroupedResults, options: BomOptions = {}): BomEntry[] {
  const rows = [...groups.values()].flatMap((group) => groupRows(group, options));
  rows.sort(compareBomEntries);

  const unmatched = rows.filter((row) => row.matchQuality === 'No match').length;
  logger.debug(`Built ${rows.length} BOM rows (${unmatched} unmatched)`);
  return rows;
}

/**
 * Diagnostics of every unmatched group, in group order.
 */
export function collectDiagnostics(groups: GroupedResults): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  for (const group of groups.values()) {
    if (group.report.diagnostic) diagnostics.push(group.report.diagnostic);
  }
  return diagnostics;
}

export const bomService = {
  buildBomEntries,
  collectDiagnostics,
  compareBomEntries,
  parseReference,
};

export default bomService;
