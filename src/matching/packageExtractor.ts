/**
 * Package Token Extraction
 *
 * Reduces a footprint name to a short package token that inventory
 * "Package" columns can be searched for:
 *
 * - "R_0603_1608Metric"                     → "0603"
 * - "Package_SO:SOIC-8_3.9x4.9mm_P1.27mm"   → "SOIC-8"
 * - "Package_TO_SOT_SMD:SOT-23-5"           → "SOT-23-5"
 * - "Connector_PinHeader_2.54mm:PinHeader_1x04_P2.54mm_Vertical" → "PinHeader_1x04"
 */

export interface PackagePattern {
  readonly name: string;
  readonly pattern: RegExp;
  readonly format: (match: RegExpExecArray) => string;
}

const upper = (match: RegExpExecArray): string => match[0].toUpperCase();

/** Named families that are followed by a pin count, longest names first */
const COUNTED_FAMILIES = [
  'TSSOP',
  'HTSSOP',
  'MSOP',
  'SSOP',
  'SOIC',
  'LQFP',
  'TQFP',
  'QFP',
  'QFN',
  'DFN',
  'BGA',
  'WLCSP',
  'PLCC',
  'DIP',
  'SOD',
  'SOT',
  'TO',
  'SC',
] as const;

/**
 * Ordered most to least specific; the first pattern that matches wins.
 */
export const PACKAGE_PATTERNS: readonly PackagePattern[] = [
  {
    name: 'imperial chip size',
    pattern: /(?<!\d)(?:01005|0201|0402|0603|0805|1008|1206|1210|1806|1812|2010|2512)(?!\d)/,
    format: (match) => match[0],
  },
  {
    name: 'counted package family',
    pattern: new RegExp(
      `(?<![A-Z])(${COUNTED_FAMILIES.join('|')})-?(\\d+)(?:-(\\d+)(?![A-Z\\d]))?(?![\\d.])`,
      'i'
    ),
    format: (match) => {
      const [, family, count, suffix] = match;
      return `${family.toUpperCase()}-${count}${suffix ? `-${suffix}` : ''}`;
    },
  },
  {
    name: 'power package',
    pattern: /(?<![A-Z])D2?PAK(?![A-Z])/i,
    format: upper,
  },
  {
    name: 'bare package family',
    pattern: new RegExp(`(?<![A-Z])(?:${COUNTED_FAMILIES.filter((f) => f.length > 2).join('|')})(?![A-Z])`, 'i'),
    format: upper,
  },
];

/** Dimension and pitch annotations ("_3.9x4.9mm", "_P1.27mm", "_L6.3mm") and everything after */
const SIZE_SUFFIX = /_[A-Z]{0,2}\d+(?:\.\d+)?(?:x\d+(?:\.\d+)?)*mm.*$/i;
const METRIC_SUFFIX = /_\d{4}Metric.*$/i;

/**
 * Extracts a package token from a footprint, or "" for an empty footprint.
 * Unrecognized footprints yield their name with the library namespace and
 * size annotations stripped.
 */
export function extractPackage(footprint: string): string {
  const trimmed = (footprint ?? '').trim();
  if (!trimmed) return '';

  for (const { pattern, format } of PACKAGE_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (match) return format(match);
  }

  const name = trimmed.includes(':') ? trimmed.slice(trimmed.indexOf(':') + 1) : trimmed;
  return name.replace(SIZE_SUFFIX, '').replace(METRIC_SUFFIX, '').trim();
}

function compact(text: string): string {
  return text.toLowerCase().replace(/[\s_-]+/g, '');
}

/**
 * True when an inventory package field contains the token, ignoring case,
 * dashes, underscores and spaces ("SOT23" carries "SOT-23").
 */
export function packageContains(inventoryPackage: string, token: string): boolean {
  if (!token) return true;
  if (!inventoryPackage) return false;
  return compact(inventoryPackage).includes(compact(token));
}

export default extractPackage;
