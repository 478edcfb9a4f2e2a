import type { FrequencyModifier, SourceOffset, TimingRepeat } from '@notefhir/shared';

export interface FrequencyMention extends FrequencyModifier {
  readonly sourceOffset: SourceOffset;
}

const FREQUENCY_RE =
  /(?<![a-z0-9])(?:once[ \t]+(?:a[ \t]+)?daily|twice[ \t]+(?:a[ \t]+)?daily|three[ \t]+times[ \t]+(?:a[ \t]+)?daily|four[ \t]+times[ \t]+(?:a[ \t]+)?daily|daily|qd|bid|tid|qid|qhs|at[ \t]+bedtime|weekly|q[ \t]*(\d+)[ \t]*h(?:ours?|rs?)?|every[ \t]+(\d+)[ \t]+hours?|prn|as[ \t]+needed)(?![a-z0-9])/g;

const FIXED: Record<string, TimingRepeat> = {
  daily: { frequency: 1, period: 1, periodUnit: 'd' },
  qd: { frequency: 1, period: 1, periodUnit: 'd' },
  qhs: { frequency: 1, period: 1, periodUnit: 'd' },
  bid: { frequency: 2, period: 1, periodUnit: 'd' },
  tid: { frequency: 3, period: 1, periodUnit: 'd' },
  qid: { frequency: 4, period: 1, periodUnit: 'd' },
  weekly: { frequency: 1, period: 1, periodUnit: 'wk' },
};

const TIMES_DAILY: Record<string, number> = { once: 1, twice: 2, three: 3, four: 4 };

function repeatFor(phrase: string, hours: string | undefined): TimingRepeat | undefined {
  if (hours !== undefined) {
    return { frequency: 1, period: Number(hours), periodUnit: 'h' };
  }
  const fixed = FIXED[phrase];
  if (fixed) return fixed;
  if (phrase === 'at bedtime') return FIXED.qhs;
  const times = TIMES_DAILY[phrase.split(' ')[0] ?? ''];
  return times !== undefined ? { frequency: times, period: 1, periodUnit: 'd' } : undefined;
}

/**
 * Dosing frequency phrases in normalized text. These modify a medication and
 * never become entities of their own.
 */
export function findFrequencies(normalized: string): FrequencyMention[] {
  const mentions: FrequencyMention[] = [];
  for (const match of normalized.matchAll(FREQUENCY_RE)) {
    const start = match.index ?? 0;
    const text = match[0].replace(/\s+/g, ' ');
    const asNeeded = text === 'prn' || text === 'as needed';
    mentions.push({
      text,
      sourceOffset: { start, end: start + match[0].length },
      repeat: asNeeded ? undefined : repeatFor(text, match[1] ?? match[2]),
      asNeeded,
    });
  }
  return mentions;
}
