/**
 * No-Match Diagnostics
 *
 * Explains why a component found no inventory candidate. Exactly one issue
 * from a closed set is assigned, checked in this order:
 *
 * 1. TYPE_UNKNOWN             - category could not be determined
 * 2. NO_TYPE_MATCH            - no inventory item of the category
 * 3. NO_VALUE_MATCH           - items of the category, none with the value
 * 4. PACKAGE_MISMATCH         - the value exists, only in other packages
 * 5. PACKAGE_MISMATCH_GENERIC - the value exists, in items without a package
 * 6. NO_MATCH                 - anything else
 */

import { CATEGORY_DISPLAY_NAMES, CATEGORY_FRIENDLY_NAMES } from './constants';
import { toAnnotated } from './models';
import type { MatchSubject } from './models';
import { categoryMatches } from './matchScorer';
import { packageContains } from './packageExtractor';
import { ComponentCategory } from './types';
import type {
  AnnotatedComponent,
  Diagnostic,
  DiagnosticFormat,
  DiagnosticIssue,
  InventoryItem,
  ParseOptions,
} from './types';
import { valuesEqual } from './valueParser';

// ============================================
// ANALYSIS
// ============================================

function classifyIssue(
  annotated: AnnotatedComponent,
  inventory: readonly InventoryItem[],
  options: ParseOptions
): DiagnosticIssue {
  const { component, category, packageToken } = annotated;
  if (category === ComponentCategory.UNKNOWN) {
    return { kind: 'TYPE_UNKNOWN' };
  }

  const sameType = inventory.filter((item) => categoryMatches(category, item.category));
  if (sameType.length === 0) {
    return { kind: 'NO_TYPE_MATCH', category };
  }

  if (!component.value) {
    return { kind: 'NO_MATCH' };
  }

  const sameValue = sameType.filter((item) => valuesEqual(category, component.value, item.value, options));
  if (sameValue.length === 0) {
    return { kind: 'NO_VALUE_MATCH', category, value: component.value };
  }

  const wrongPackage = packageToken
    ? sameValue.filter((item) => !packageContains(item.package, packageToken))
    : [];
  if (wrongPackage.length === 0) {
    return { kind: 'NO_MATCH' };
  }

  const availablePackages = [...new Set(wrongPackage.map((item) => item.package).filter(Boolean))].sort();
  if (availablePackages.length === 0) {
    return { kind: 'PACKAGE_MISMATCH_GENERIC', requiredPackage: packageToken };
  }
  return {
    kind: 'PACKAGE_MISMATCH',
    value: component.value,
    requiredPackage: packageToken,
    availablePackages,
  };
}

/**
 * Analyzes a component that found no candidate. Intended for empty match
 * lists, but well-defined for any component.
 */
export function analyze(
  subject: MatchSubject,
  inventory: readonly InventoryItem[],
  options: ParseOptions = {}
): Diagnostic {
  const annotated = toAnnotated(subject, options);
  const { component } = annotated;

  return {
    component: {
      reference: component.reference,
      libraryId: component.libraryId,
      value: component.value,
      footprint: component.footprint,
    },
    analysis: {
      category: annotated.category,
      packageToken: annotated.packageToken,
      normalizedValue: annotated.normalizedValue,
    },
    issue: classifyIssue(annotated, inventory, options),
  };
}

// ============================================
// RENDERING
// ============================================

/** "switch" → "switches", "resistor" → "resistors" */
export function pluralize(noun: string): string {
  return /(?:s|sh|ch|x|z)$/i.test(noun) ? `${noun}es` : `${noun}s`;
}

function splitLibraryId(libraryId: string): { namespace: string; part: string } {
  const separator = libraryId.indexOf(':');
  if (separator === -1) return { namespace: '', part: libraryId };
  return { namespace: libraryId.slice(0, separator), part: libraryId.slice(separator + 1) };
}

function describeComponent(diagnostic: Diagnostic, format: DiagnosticFormat): string {
  const { reference, libraryId, value } = diagnostic.component;
  const { category, packageToken } = diagnostic.analysis;
  const { namespace, part } = splitLibraryId(libraryId);
  const source = format === 'terse' ? `Component: ${reference} (${libraryId})` : `Component ${reference}`;

  if (category === ComponentCategory.UNKNOWN) {
    return `${source} from ${namespace} (part: ${part})`;
  }

  const details = [value, packageToken, CATEGORY_DISPLAY_NAMES[category]].filter(Boolean).join(' ');
  return format === 'terse' ? `${source} is a ${details}` : `${source} from ${namespace} is a ${details}`;
}

function describeIssue(issue: DiagnosticIssue, format: DiagnosticFormat): string {
  const verbose = format === 'verbose';

  switch (issue.kind) {
    case 'TYPE_UNKNOWN':
      return verbose
        ? 'Cannot determine component type - may be a non-electronic part (board outline, label, etc.)'
        : 'Component type could not be determined';
    case 'NO_TYPE_MATCH':
      return verbose
        ? `No ${pluralize(CATEGORY_FRIENDLY_NAMES[issue.category])} in inventory`
        : `No ${issue.category} components found in inventory`;
    case 'NO_VALUE_MATCH':
      return verbose
        ? `No ${pluralize(CATEGORY_FRIENDLY_NAMES[issue.category])} with value '${issue.value}' in inventory`
        : `No ${issue.category} components with value ${issue.value} found`;
    case 'PACKAGE_MISMATCH':
      return `Value '${issue.value}' available in ${issue.availablePackages.join(', ')} packages, but not ${issue.requiredPackage}`;
    case 'PACKAGE_MISMATCH_GENERIC':
      return verbose
        ? `Package mismatch - needs ${issue.requiredPackage}`
        : `Package mismatch - required ${issue.requiredPackage}`;
    case 'NO_MATCH':
      return "Component specification doesn't match any inventory items";
  }
}

/**
 * Renders a diagnostic as a single line for spreadsheet cells ('terse')
 * or as two lines for console output ('verbose').
 *
 * @example
 * // terse
 * "Component: R1 (Device:R) is a 10K 0603 Resistor; Issue: No RES components with value 10K found"
 * // verbose
 * "Component R1 from Device is a 10K 0603 Resistor\n    Issue: No resistors with value '10K' in inventory"
 */
export function renderDiagnostic(diagnostic: Diagnostic, format: DiagnosticFormat = 'terse'): string {
  const description = describeComponent(diagnostic, format);
  const issue = describeIssue(diagnostic.issue, format);
  return format === 'terse' ? `${description}; Issue: ${issue}` : `${description}\n    Issue: ${issue}`;
}

export default analyze;
