import type { SourceOffset } from '@notefhir/shared';

// Periods inside decimals ("0.5 mg") do not end a sentence
const BOUNDARY_RE = /(?<!\d)[.;](?!\d)|\n/g;

export function splitSentences(text: string): SourceOffset[] {
  const sentences: SourceOffset[] = [];
  let start = 0;
  for (const match of text.matchAll(BOUNDARY_RE)) {
    const end = match.index ?? start;
    if (end > start) sentences.push({ start, end });
    start = end + match[0].length;
  }
  if (start < text.length) sentences.push({ start, end: text.length });
  return sentences;
}

/** Index of the sentence containing the offset, or -1. */
export function sentenceIndexAt(sentences: readonly SourceOffset[], offset: number): number {
  return sentences.findIndex((s) => offset >= s.start && offset < s.end);
}
