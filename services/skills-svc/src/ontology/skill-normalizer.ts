import { ServiceError, getLogger } from '@skillgap/common';
import type { Logger } from 'pino';
import { z } from 'zod';

import type { SkillMatch, SkillMatchTier, SkillSource } from '../types';
import type { MatchTier, OntologyStore } from './ontology-store';
import type { Skill } from './types';

const TIER_CONFIDENCE: Record<MatchTier, number> = {
  name: 1.0,
  alias: 0.95,
  keyword: 0.8
};

const FALLBACK_CONFIDENCE = 0.5;
const LABELLED_HIT_CONFIDENCE = 0.9;
const LABELLED_UNKNOWN_CONFIDENCE = 0.6;

const MIN_TOKEN_LENGTH = 2;
const MAX_TOKEN_LENGTH = 29;

const BOUNDARY_CHARS = String.raw`\s,;:()\[\]{}|"'!?`;
const LEADING_BOUNDARY = String.raw`(?<=^|[${BOUNDARY_CHARS}])`;
const TRAILING_BOUNDARY = String.raw`(?=$|[${BOUNDARY_CHARS}]|\.(?:\s|$))`;

const LIST_LABEL_PATTERN =
  /(?<!\p{L})(?:skill set|skills?|tech stack|technologies|technology|competencies|kỹ năng|compétences)[\s:]+([^\n]+)/giu;
const LIST_SEPARATOR_PATTERN = /[,;|•·]|(?<!\p{L})and(?!\p{L})/iu;

interface TermMatcher {
  skill: Skill;
  tier: MatchTier;
  pattern: RegExp;
}

export class SkillInputValidationError extends ServiceError {
  constructor(message: string, details: Record<string, unknown>) {
    super(message, { statusCode: 400, code: 'bad_request', details });
    this.name = 'SkillInputValidationError';
  }
}

const skillListSchema = z.array(z.string());

/**
 * Boundary check for raw skill lists coming from callers.
 * Rejects non-arrays and non-string entries instead of coercing them.
 */
export function parseSkillList(value: unknown, field = 'skills'): string[] {
  const parsed = skillListSchema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }

  const issue = parsed.error.issues[0];
  const index = issue?.path[0];
  if (typeof index === 'number') {
    throw new SkillInputValidationError(`${field}[${index}] must be a string.`, { field, index });
  }

  throw new SkillInputValidationError(`${field} must be an array of strings.`, { field });
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function titleCase(value: string): string {
  return value.replace(/\p{L}+/gu, (word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
}

export class SkillNormalizer {
  private readonly logger: Logger;
  private readonly matchers: TermMatcher[];

  constructor(
    private readonly store: OntologyStore,
    logger?: Logger
  ) {
    this.logger = logger ?? getLogger({ module: 'skill-normalizer' });
    this.matchers = this.buildMatchers();
  }

  normalize(raw: string, source: SkillSource = 'unknown'): SkillMatch {
    const trimmed = raw.trim();
    const hit = this.store.lookup(trimmed);

    if (hit) {
      return this.toMatch(trimmed, hit.skill, hit.matchedBy, TIER_CONFIDENCE[hit.matchedBy], source);
    }

    return this.toFallback(trimmed, FALLBACK_CONFIDENCE, source);
  }

  /** Blank entries are dropped; duplicates (by normalized name, any case) keep the first occurrence. */
  normalizeList(rawList: readonly string[], source: SkillSource = 'unknown'): SkillMatch[] {
    const seen = new Set<string>();
    const matches: SkillMatch[] = [];

    for (const raw of rawList) {
      if (raw.trim().length === 0) {
        continue;
      }

      const match = this.normalize(raw, source);
      const key = match.normalizedName.toLowerCase();
      if (seen.has(key)) {
        continue;
      }

      seen.add(key);
      matches.push(match);
    }

    return matches;
  }

  /**
   * Best-effort harvest from prose: every ontology term found on a word boundary,
   * then the entries of labelled lists such as "Skills: Go, Rust".
   */
  extractFromText(text: string, source: SkillSource = 'text'): SkillMatch[] {
    if (text.trim().length === 0) {
      return [];
    }

    const seen = new Set<string>();
    const matches: SkillMatch[] = [];
    const push = (match: SkillMatch): void => {
      const key = match.normalizedName.toLowerCase();
      if (!seen.has(key)) {
        seen.add(key);
        matches.push(match);
      }
    };

    for (const matcher of this.matchers) {
      if (seen.has(matcher.skill.name.toLowerCase())) {
        continue;
      }

      const found = matcher.pattern.exec(text);
      if (found) {
        push(this.toMatch(found[0], matcher.skill, matcher.tier, TIER_CONFIDENCE[matcher.tier], source));
      }
    }

    let labelledTokens = 0;
    for (const section of text.matchAll(LIST_LABEL_PATTERN)) {
      const list = section[1] ?? '';
      for (const piece of list.split(LIST_SEPARATOR_PATTERN)) {
        const token = piece.trim();
        if (token.length < MIN_TOKEN_LENGTH || token.length > MAX_TOKEN_LENGTH) {
          continue;
        }

        labelledTokens += 1;
        const hit = this.store.lookup(token);
        if (hit) {
          push(this.toMatch(token, hit.skill, 'pattern', LABELLED_HIT_CONFIDENCE, source));
        } else {
          push(this.toFallback(token, LABELLED_UNKNOWN_CONFIDENCE, source));
        }
      }
    }

    this.logger.debug({ source, extracted: matches.length, labelledTokens }, 'Extracted skills from text');

    return matches;
  }

  private buildMatchers(): TermMatcher[] {
    const matchers: TermMatcher[] = [];
    const registered = new Set<string>();

    for (const skill of this.store.all()) {
      const terms: Array<[string, MatchTier]> = [
        [skill.name, 'name'],
        ...skill.aliases.map((alias): [string, MatchTier] => [alias, 'alias']),
        ...skill.keywords.map((keyword): [string, MatchTier] => [keyword, 'keyword'])
      ];

      for (const [term, tier] of terms) {
        const key = term.toLowerCase();
        // A keyword shared with an earlier skill belongs to that skill.
        if (registered.has(key) || this.store.lookup(term)?.skill.id !== skill.id) {
          continue;
        }

        registered.add(key);
        matchers.push({
          skill,
          tier,
          pattern: new RegExp(`${LEADING_BOUNDARY}${escapeRegExp(term)}${TRAILING_BOUNDARY}`, 'iu')
        });
      }
    }

    return matchers;
  }

  private toMatch(
    rawName: string,
    skill: Skill,
    matchedBy: SkillMatchTier,
    confidence: number,
    source: SkillSource
  ): SkillMatch {
    return {
      rawName,
      normalizedName: skill.name,
      category: skill.category,
      confidence,
      inOntology: true,
      skillId: skill.id,
      matchedBy,
      source
    };
  }

  private toFallback(rawName: string, confidence: number, source: SkillSource): SkillMatch {
    return {
      rawName,
      normalizedName: titleCase(rawName),
      category: 'Other',
      confidence,
      inOntology: false,
      skillId: null,
      matchedBy: 'fallback',
      source
    };
  }
}
