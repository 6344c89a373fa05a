/**
 * Card number normalization for matching source labels.
 * Pure functions, no I/O.
 */

function stripLeadingZeros(value: string): string {
  return /^\d+$/.test(value) ? value.replace(/^0+/, '') || '0' : value;
}

/**
 * All forms a card number may take in a source label.
 *
 *   "#001/024"  → ["001/024", "001024", "001-024", "001", "1"]
 *   "OP13-001"  → ["OP13-001", "OP13001", "OP13/001"]
 *   "058"       → ["058", "58"]
 */
export function cardNumberVariants(raw: string | undefined): string[] {
  if (!raw) return [];
  const clean = raw.replace(/#/g, '').replace(/\s+/g, '').toUpperCase();
  if (!clean) return [];

  const variants = new Set<string>([clean]);
  variants.add(clean.replace(/[-/]/g, ''));
  if (clean.includes('/')) variants.add(clean.replace(/\//g, '-'));
  if (clean.includes('-')) variants.add(clean.replace(/-/g, '/'));

  if (clean.includes('/')) {
    const numerator = clean.split('/')[0];
    if (numerator) {
      variants.add(numerator);
      variants.add(stripLeadingZeros(numerator));
    }
  } else {
    variants.add(stripLeadingZeros(clean));
  }

  return [...variants].filter((v) => v.length > 0);
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Short purely-numeric forms must stand alone ("#4", " 4/", " 004 ") so that
 * "4" does not match "#14" or "2024". Everything else is a substring match,
 * also tried with separators removed on both sides.
 */
export function matchesCardNumber(label: string, variants: readonly string[]): boolean {
  const upper = label.toUpperCase();
  const compactLabel = upper.replace(/[#\s\-/]/g, '');

  return variants.some((variant) => {
    if (/^\d{1,4}$/.test(variant)) {
      const n = escapeRegExp(stripLeadingZeros(variant));
      return new RegExp(`(?:^|[\\s#(\\[])0*${n}(?=$|[\\s/)\\]])`).test(upper);
    }
    return upper.includes(variant) || compactLabel.includes(variant.replace(/[-/]/g, ''));
  });
}
