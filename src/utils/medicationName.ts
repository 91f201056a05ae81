/**
 * Drug identity and clinical term normalization.
 *
 * Brand → generic resolution happens upstream; this only canonicalizes the
 * spelling of a generic name so records from different visits group together.
 */

/**
 * Common medication salts/formulations to strip
 */
const SALT_SUFFIXES = [
  'succinate',
  'tartrate',
  'hydrochloride',
  'hcl',
  'sulfate',
  'sodium',
  'potassium',
  'calcium',
  'maleate',
  'fumarate',
  'acetate',
  'phosphate',
  'citrate',
  'besylate',
  'mesylate',
  'er',
  'xl',
  'xr',
  'sr',
  'cr',
  'la',
  'cd',
];

const SUFFIX_PATTERNS = SALT_SUFFIXES.map((suffix) => new RegExp(`\\s+${suffix}$`, 'i'));

const stripSaltSuffixes = (value: string): string => {
  let current = value;
  let previous = '';

  while (current !== previous) {
    previous = current;
    for (const pattern of SUFFIX_PATTERNS) {
      if (pattern.test(current)) {
        current = current.replace(pattern, '').trim();
        break;
      }
    }
  }

  return current;
};

/**
 * Canonical drug identity for a generic name: lowercase, single-spaced,
 * salt and release-form suffixes removed.
 */
export function normalizeDrugIdentity(name: string): string {
  const lower = name.toLowerCase().trim().replace(/\s+/g, ' ');
  if (!lower) {
    return lower;
  }
  return stripSaltSuffixes(lower);
}

/**
 * Canonical key for classes, conditions, allergens and reactions
 * ("Renal Impairment" → "renal_impairment", "ACE-inhibitor" → "ace_inhibitor").
 */
export function normalizeTerm(term: string): string {
  return term.toLowerCase().trim().replace(/[\s-]+/g, '_');
}

/** Order-insensitive key for a pair of identifiers. */
export function pairKey(a: string, b: string): string {
  return a <= b ? `${a}::${b}` : `${b}::${a}`;
}

/** Code-unit ordering for identifiers, independent of the host locale. */
export function compareIdentifiers(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
