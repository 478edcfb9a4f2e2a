import { ENTITY_KINDS } from '@notefhir/shared';
import type { EntityKind, ExtractedEntity } from '@notefhir/shared';
import type { Lexicon } from './lexicon.js';
import { buildRules, type PatternRule } from './rules.js';
import { collapseWhitespace, normalizeForMatching } from './normalize.js';

interface Candidate {
  rule: PatternRule;
  ruleIndex: number;
  start: number;
  end: number;
  normStart: number;
  normEnd: number;
}

const KIND_ORDER = new Map<EntityKind, number>(ENTITY_KINDS.map((kind, i) => [kind, i]));

function groupSpan(match: RegExpMatchArray, group: number): [number, number] | undefined {
  return match.indices?.[group];
}

function byPrecedence(a: Candidate, b: Candidate): number {
  return (
    b.end - b.start - (a.end - a.start) ||
    b.rule.specificity - a.rule.specificity ||
    a.ruleIndex - b.ruleIndex ||
    a.start - b.start
  );
}

/**
 * Finds typed, positioned clinical mentions in free text. Stateless after
 * construction; safe to share between concurrent conversions.
 */
export class EntityExtractor {
  private readonly rules: readonly PatternRule[];

  constructor(lexicon: Lexicon) {
    this.rules = buildRules(lexicon);
  }

  extract(text: string): ExtractedEntity[] {
    const normalized = normalizeForMatching(text);
    const byKind = new Map<EntityKind, Candidate[]>();

    this.rules.forEach((rule, ruleIndex) => {
      for (const match of normalized.matchAll(rule.pattern)) {
        const candidate = this.toCandidate(rule, ruleIndex, match, normalized, text);
        if (!candidate) continue;
        const list = byKind.get(rule.kind) ?? [];
        list.push(candidate);
        byKind.set(rule.kind, list);
      }
    });

    const entities: ExtractedEntity[] = [];
    for (const candidates of byKind.values()) {
      for (const c of this.resolveOverlaps(candidates)) {
        entities.push({
          kind: c.rule.kind,
          rawText: text.slice(c.start, c.end),
          normalizedText: collapseWhitespace(normalized.slice(c.normStart, c.normEnd)),
          sourceOffset: { start: c.start, end: c.end },
          confidence: c.rule.confidence,
          rule: c.rule.id,
        });
      }
    }

    // A name like "Ana Lopez" is not also a lab test
    const names = entities.filter((e) => e.kind === 'Patient').map((e) => e.sourceOffset);
    return entities
      .filter(
        (e) =>
          e.kind === 'Patient' ||
          !names.some((n) => n.start <= e.sourceOffset.start && e.sourceOffset.end <= n.end),
      )
      .sort(
        (a, b) =>
          a.sourceOffset.start - b.sourceOffset.start ||
          (KIND_ORDER.get(a.kind) ?? 0) - (KIND_ORDER.get(b.kind) ?? 0),
      );
  }

  private toCandidate(
    rule: PatternRule,
    ruleIndex: number,
    match: RegExpMatchArray,
    normalized: string,
    text: string,
  ): Candidate | undefined {
    const span = groupSpan(match, rule.spanGroup ?? 0);
    if (!span) return undefined;

    const refined = rule.refine
      ? rule.refine({ start: span[0], end: span[1] }, normalized, text)
      : { start: span[0], end: span[1] };
    if (!refined || refined.end <= refined.start) return undefined;

    const lookup = rule.normalizeGroup !== undefined ? groupSpan(match, rule.normalizeGroup) : undefined;
    return {
      rule,
      ruleIndex,
      start: refined.start,
      end: refined.end,
      normStart: lookup ? lookup[0] : refined.start,
      normEnd: lookup ? lookup[1] : refined.end,
    };
  }

  /** Keep the widest of overlapping same-kind spans, then the next widest that fits, and so on. */
  private resolveOverlaps(candidates: Candidate[]): Candidate[] {
    const kept: Candidate[] = [];
    for (const candidate of [...candidates].sort(byPrecedence)) {
      const overlaps = kept.some((k) => candidate.start < k.end && k.start < candidate.end);
      if (!overlaps) kept.push(candidate);
    }
    return kept;
  }
}
