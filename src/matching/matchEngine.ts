/**
 * Match Engine
 *
 * Scans the inventory for each component and ranks what it finds.
 *
 * Flow per component:
 * 1. Annotate (category, package token, parsed value, tolerance intent)
 * 2. Apply the primary filters to every inventory item
 * 3. Score the survivors, dropping zero scores
 * 4. Order by priority ascending, score descending, inventory order
 * 5. Surface tied alternates (verbose), precision warnings and, when
 *    nothing qualifies, a diagnostic
 *
 * The inventory is read-only for the engine's lifetime and no call mutates
 * shared state, so independent components may be matched in any order.
 */

import { env } from '../config';
import logger from '../utils/logger';
import { analyze } from './diagnosticAnalyzer';
import { formatScoreTrace, passesPrimaryFilters, scoreItem } from './matchScorer';
import { annotateComponent, impliesPrecision } from './models';
import type {
  AnnotatedComponent,
  Component,
  ComponentMatchReport,
  Diagnostic,
  GroupedResults,
  InventoryItem,
  MatchEngineOptions,
  MatchResult,
  MatchWarning,
} from './types';
import { PRECISION_THRESHOLD } from './constants';
import { normalizeValue, parseTolerance } from './valueParser';

export type ResolvedEngineOptions = Required<MatchEngineOptions>;

/**
 * Total order over candidates: priority ascending, score descending,
 * then original inventory position.
 */
export function compareMatches(left: MatchResult, right: MatchResult): number {
  return left.priority - right.priority || right.score - left.score || left.inventoryIndex - right.inventoryIndex;
}

interface CandidateScan {
  readonly candidates: MatchResult[];
  /** Items that passed the primary filters, scored or not */
  readonly filtered: InventoryItem[];
}

export class MatchEngine {
  private readonly inventory: readonly InventoryItem[];
  private readonly options: ResolvedEngineOptions;

  constructor(inventory: readonly InventoryItem[], options: MatchEngineOptions = {}) {
    this.inventory = [...inventory];
    this.options = {
      verbose: options.verbose ?? false,
      debug: options.debug ?? false,
      maxAlternates: options.maxAlternates ?? env.MATCH_MAX_ALTERNATES,
      legacyBareUnits: options.legacyBareUnits ?? env.MATCH_LEGACY_BARE_UNITS,
    };
  }

  get settings(): ResolvedEngineOptions {
    return { ...this.options };
  }

  get inventorySize(): number {
    return this.inventory.length;
  }

  annotate(component: Component): AnnotatedComponent {
    return annotateComponent(component, this.options);
  }

  /**
   * Ordered candidates for a component; empty when nothing qualifies.
   */
  findMatches(component: Component): MatchResult[] {
    return this.scan(this.annotate(component)).candidates;
  }

  /**
   * Full report for one component: candidates, the chosen best match,
   * tie handling, warnings and, when empty, a diagnostic.
   */
  matchComponent(component: Component): ComponentMatchReport {
    const annotated = this.annotate(component);
    const { candidates, filtered } = this.scan(annotated);

    if (candidates.length === 0) {
      return {
        annotated,
        candidates,
        best: null,
        alternates: [],
        tiedCount: 0,
        notes: [],
        warnings: [],
        diagnostic: this.analyze(annotated),
      };
    }

    const [best, ...rest] = candidates;
    const tied = rest.filter((candidate) => candidate.priority === best.priority);
    const notes: string[] = [];
    let alternates: MatchResult[] = [];

    if (this.options.verbose && tied.length > 0) {
      notes.push(`Tied priority ${best.priority}: ${tied.length + 1} options`);
      alternates = tied.slice(0, this.options.maxAlternates);
    }

    return {
      annotated,
      candidates,
      best,
      alternates,
      tiedCount: tied.length + 1,
      notes,
      warnings: this.precisionWarnings(annotated, best, filtered),
      diagnostic: null,
    };
  }

  /**
   * Matches a batch, grouping components that share a best match
   * (`${ipn}_${footprint}`) or, unmatched, a raw value and footprint
   * (`NO_MATCH_${value}_${footprint}`). Groups keep first-seen order.
   */
  groupAndMatch(components: readonly Component[]): GroupedResults {
    const groups: GroupedResults = new Map();
    const members = new Map<string, Component[]>();
    const reports = new Map<string, ComponentMatchReport>();

    for (const component of components) {
      const identity = this.identityKey(component);
      let report = reports.get(identity);
      if (!report) {
        report = this.matchComponent(component);
        reports.set(identity, report);
      }

      const key = report.best
        ? `${report.best.item.ipn}_${component.footprint}`
        : `NO_MATCH_${component.value}_${component.footprint}`;

      const existing = members.get(key);
      if (existing) {
        existing.push(component);
        continue;
      }

      const list = [component];
      members.set(key, list);
      groups.set(key, { key, components: list, report });
    }

    logger.debug(`Grouped ${components.length} components into ${groups.size} groups (${reports.size} distinct)`);
    return groups;
  }

  /**
   * Explains an empty match list against this engine's inventory.
   */
  analyze(component: Component | AnnotatedComponent): Diagnostic {
    return analyze(component, this.inventory, this.options);
  }

  // ============================================
  // Internals
  // ============================================

  private scan(annotated: AnnotatedComponent): CandidateScan {
    const candidates: MatchResult[] = [];
    const filtered: InventoryItem[] = [];

    this.inventory.forEach((item, inventoryIndex) => {
      if (!passesPrimaryFilters(annotated, item, this.options)) return;
      filtered.push(item);

      const result = scoreItem(annotated, item, this.options);
      if (result.score <= 0) return;

      candidates.push({
        item,
        score: result.score,
        priority: item.priority,
        inventoryIndex,
        breakdown: result.breakdown,
        ...(this.options.debug ? { debugTrace: formatScoreTrace(item, result) } : {}),
      });
    });

    candidates.sort(compareMatches);

    const { component } = annotated;
    logger.debug(
      `${component.reference} (${component.libraryId}): type ${annotated.category}, ` +
        `package ${annotated.packageToken || 'None'}, value ${component.value || 'None'}; ` +
        `candidates ${this.inventory.length}, passed filters ${filtered.length}, matched ${candidates.length}`
    );
    if (this.options.debug) {
      for (const candidate of candidates) logger.debug(candidate.debugTrace ?? '');
    }

    return { candidates, filtered };
  }

  /**
   * A resistor that implies 1% precision is flagged when nothing in the
   * filtered set is 1% or better, even though a looser match is returned.
   */
  private precisionWarnings(
    annotated: AnnotatedComponent,
    best: MatchResult,
    filtered: readonly InventoryItem[]
  ): MatchWarning[] {
    if (!impliesPrecision(annotated)) return [];

    const hasPrecisionItem = filtered.some((item) => {
      const tolerance = parseTolerance(item.tolerance);
      return tolerance !== null && tolerance <= PRECISION_THRESHOLD;
    });
    if (hasPrecisionItem) return [];

    return [
      {
        kind: 'PRECISION_UNAVAILABLE',
        message: `Schematic implies 1% resistor but no 1% inventory item found (best tolerance ${best.item.tolerance || 'unknown'})`,
      },
    ];
  }

  /** Components equal under this key always produce the same report */
  private identityKey(component: Component): string {
    const properties = Object.entries(component.properties).sort(([a], [b]) => a.localeCompare(b));
    return JSON.stringify([
      component.libraryId,
      normalizeValue(component.value),
      component.footprint,
      component.reference.replace(/\d.*$/, ''),
      properties,
    ]);
  }
}

export default MatchEngine;
