const FOLDS: Record<string, string> = {
  '\u2018': "'",
  '\u2019': "'",
  '\u201c': '"',
  '\u201d': '"',
  '\u2013': '-',
  '\u2014': '-',
  '\u2212': '-',
  '\u00a0': ' ',
  '\u2009': ' ',
  '\u202f': ' ',
};

/**
 * Lower-case the text and fold typographic punctuation, one UTF-16 code unit
 * at a time, so every offset in the result is an offset in the input.
 */
export function normalizeForMatching(text: string): string {
  let out = '';
  for (let i = 0; i < text.length; i++) {
    const ch = text.charAt(i);
    const folded = FOLDS[ch];
    if (folded !== undefined) {
      out += folded;
      continue;
    }
    const lower = ch.toLowerCase();
    out += lower.length === 1 ? lower : ch;
  }
  return out;
}

/** Collapse internal whitespace of a normalized span. */
export function collapseWhitespace(span: string): string {
  return span.replace(/\s+/g, ' ').trim();
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Alternation of vocabulary terms, longest first so a multi-word term wins
 * over its own prefix. Spaces inside a term match any run of blanks.
 */
export function termAlternation(terms: readonly string[]): string {
  return [...new Set(terms)]
    .sort((a, b) => b.length - a.length || a.localeCompare(b))
    .map((term) => escapeRegExp(term).replace(/ +/g, '[ \\t]+'))
    .join('|');
}
