/**
 * Gap Analyzer
 *
 * Compares a candidate skill list against a required skill list and produces a
 * quantified GapReport: set algebra over canonical names, related-skill partial
 * credit, severity grade, category buckets and learning priorities.
 *
 * @module gap-analyzer
 */

import { getLogger } from '@skillgap/common';
import type { Logger } from 'pino';

import type { OntologyStore } from './ontology/ontology-store';
import type { SkillNormalizer } from './ontology/skill-normalizer';
import { isHighDemand, type Skill } from './ontology/types';
import type {
  CategoryBuckets,
  GapReport,
  GapSeverity,
  LearningRecommendation,
  SkillInfo,
  SkillMatch
} from './types';

export const DEFAULT_RELATED_BONUS_PER_ENTRY = 0.3;

const MAX_EXTRA_SKILLS_IN_PROMPT = 10;
const MAX_RELATED_SKILLS_TO_LEARN = 3;

export interface GapAnalyzerOptions {
  /** Percentage points added per missing skill with related candidate coverage. */
  relatedBonusPerEntry?: number;
  logger?: Logger;
}

/**
 * Severity grade for a match percentage. Each band includes its lower bound.
 *
 * @example
 * severityFor(80);   // 'low'
 * severityFor(59.9); // 'high'
 */
export function severityFor(percentage: number): GapSeverity {
  if (percentage >= 80) {
    return 'low';
  }
  if (percentage >= 60) {
    return 'medium';
  }
  if (percentage >= 40) {
    return 'high';
  }
  return 'critical';
}

function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

function bucketByCategory(matches: readonly SkillMatch[]): CategoryBuckets {
  const buckets: CategoryBuckets = {};
  for (const match of matches) {
    const bucket = buckets[match.category];
    if (bucket) {
      bucket.push(match.normalizedName);
    } else {
      buckets[match.category] = [match.normalizedName];
    }
  }
  return buckets;
}

function freezeBuckets(buckets: CategoryBuckets): Readonly<CategoryBuckets> {
  for (const list of Object.values(buckets)) {
    Object.freeze(list);
  }
  return Object.freeze(buckets);
}

function keyed(matches: readonly SkillMatch[]): Map<string, SkillMatch> {
  return new Map(matches.map((match) => [match.normalizedName.toLowerCase(), match]));
}

export class GapAnalyzer {
  private readonly relatedBonusPerEntry: number;
  private readonly logger: Logger;

  constructor(
    private readonly store: OntologyStore,
    private readonly normalizer: SkillNormalizer,
    options: GapAnalyzerOptions = {}
  ) {
    this.relatedBonusPerEntry = options.relatedBonusPerEntry ?? DEFAULT_RELATED_BONUS_PER_ENTRY;
    this.logger = options.logger ?? getLogger({ module: 'gap-analyzer' });
  }

  /**
   * Computes the gap between what a candidate has and what a role requires.
   * Empty lists are valid: an empty required list is a 100% match.
   *
   * @param candidateSkills - Raw skill mentions from the candidate side
   * @param requiredSkills - Raw skill mentions from the role side
   * @returns A frozen report; lists follow first-seen input order
   */
  analyze(candidateSkills: readonly string[], requiredSkills: readonly string[]): GapReport {
    const candidate = this.normalizer.normalizeList(candidateSkills, 'cv');
    const required = this.normalizer.normalizeList(requiredSkills, 'jd');

    const candidateByKey = keyed(candidate);
    const requiredByKey = keyed(required);

    const matching = required.filter((match) => candidateByKey.has(match.normalizedName.toLowerCase()));
    const missing = required.filter((match) => !candidateByKey.has(match.normalizedName.toLowerCase()));
    const extra = candidate.filter((match) => !requiredByKey.has(match.normalizedName.toLowerCase()));

    const relatedCoverage: Record<string, readonly string[]> = {};
    const highPriorityMissing: string[] = [];
    const quickWins: string[] = [];

    for (const match of missing) {
      const skill = match.skillId ? this.store.getById(match.skillId) : null;
      if (!skill) {
        continue;
      }

      const related = this.presentInCandidate(skill.relatedSkills, candidateByKey);
      if (related.length > 0) {
        relatedCoverage[match.normalizedName] = Object.freeze(related);
      }

      if (isHighDemand(skill.marketDemand)) {
        highPriorityMissing.push(match.normalizedName);
      }

      if (this.presentInCandidate(skill.parentSkills, candidateByKey).length > 0) {
        quickWins.push(match.normalizedName);
      }
    }

    const coverageEntries = Object.keys(relatedCoverage).length;
    const matchPercentage = this.matchPercentage(matching.length, required.length, coverageEntries);
    const gapSeverity = severityFor(matchPercentage);

    this.logger.debug(
      {
        candidate: candidate.length,
        required: required.length,
        matching: matching.length,
        missing: missing.length,
        coverageEntries,
        matchPercentage
      },
      'Gap analysis computed'
    );

    return Object.freeze({
      matchingSkills: Object.freeze(matching.map((match) => match.normalizedName)),
      missingSkills: Object.freeze(missing.map((match) => match.normalizedName)),
      extraSkills: Object.freeze(extra.map((match) => match.normalizedName)),
      relatedCoverage: Object.freeze(relatedCoverage),
      matchPercentage,
      gapSeverity,
      matchingByCategory: freezeBuckets(bucketByCategory(matching)),
      missingByCategory: freezeBuckets(bucketByCategory(missing)),
      highPriorityMissing: Object.freeze(highPriorityMissing),
      quickWins: Object.freeze(quickWins)
    });
  }

  /**
   * Study plan for the missing skills the ontology knows about.
   * High-demand skills come first; order is otherwise preserved.
   */
  learningRecommendations(missingSkills: readonly string[]): LearningRecommendation[] {
    const recommendations: LearningRecommendation[] = [];

    for (const name of missingSkills) {
      const skill = this.store.get(name);
      if (!skill) {
        continue;
      }

      recommendations.push({
        skill: skill.name,
        priority: isHighDemand(skill.marketDemand) ? 'high' : 'medium',
        learningPath: skill.learningPath,
        prerequisites: this.store.resolveIds(skill.parentSkills).map((parent) => parent.name),
        relatedSkillsToLearn: this.store
          .resolveIds(skill.relatedSkills)
          .slice(0, MAX_RELATED_SKILLS_TO_LEARN)
          .map((related) => related.name),
        cvTip: skill.cvTips,
        marketDemand: skill.marketDemand
      });
    }

    const rank = (recommendation: LearningRecommendation): number => (recommendation.priority === 'high' ? 0 : 1);
    return recommendations.sort((a, b) => rank(a) - rank(b));
  }

  enrichSkill(name: string): SkillInfo | null {
    const skill = this.store.get(name);
    return skill ? this.toSkillInfo(skill) : null;
  }

  /**
   * Renders a report as a plain-text block for a downstream text generator.
   */
  formatGapForPrompt(report: GapReport): string {
    const lines: string[] = [
      '## Skill Gap Analysis',
      `Match: ${report.matchPercentage}% (gap severity: ${report.gapSeverity})`,
      ''
    ];

    lines.push('### Matching skills');
    lines.push(...this.formatBuckets(report.matchingByCategory));
    lines.push('');

    lines.push('### Missing skills');
    lines.push(...this.formatBuckets(report.missingByCategory));

    if (report.highPriorityMissing.length > 0) {
      lines.push('', `High priority (in demand): ${report.highPriorityMissing.join(', ')}`);
    }

    if (report.quickWins.length > 0) {
      lines.push('', `Quick wins (prerequisites already present): ${report.quickWins.join(', ')}`);
    }

    const coverage = Object.entries(report.relatedCoverage);
    if (coverage.length > 0) {
      lines.push('', 'Related experience:');
      for (const [skill, related] of coverage) {
        lines.push(`- ${skill}: has ${related.join(', ')}`);
      }
    }

    if (report.extraSkills.length > 0) {
      const shown = report.extraSkills.slice(0, MAX_EXTRA_SKILLS_IN_PROMPT).join(', ');
      const suffix = report.extraSkills.length > MAX_EXTRA_SKILLS_IN_PROMPT ? ', ...' : '';
      lines.push('', `Additional skills: ${shown}${suffix}`);
    }

    return lines.join('\n');
  }

  private matchPercentage(matching: number, required: number, coverageEntries: number): number {
    if (required === 0) {
      return 100;
    }

    const base = (100 * matching) / required;
    const withBonus = Math.min(100, base + this.relatedBonusPerEntry * coverageEntries);
    return roundToTenth(withBonus);
  }

  /**
   * Candidate skills named by the given identifiers. Identifiers without a
   * skill record ("linux", "ci-cd") are compared by their own spelling, so
   * fallback candidate entries still count.
   */
  private presentInCandidate(ids: readonly string[], candidateByKey: ReadonlyMap<string, SkillMatch>): string[] {
    const present: string[] = [];
    for (const id of ids) {
      const skill = this.store.getById(id);
      const keys = skill ? [skill.name.toLowerCase()] : [id.toLowerCase(), id.toLowerCase().replace(/-/g, ' ')];
      const match = keys.map((key) => candidateByKey.get(key)).find((entry) => entry !== undefined);
      if (match && !present.includes(match.normalizedName)) {
        present.push(match.normalizedName);
      }
    }
    return present;
  }

  private formatBuckets(buckets: Readonly<CategoryBuckets>): string[] {
    const entries = Object.entries(buckets);
    if (entries.length === 0) {
      return ['- none'];
    }
    return entries.map(([category, skills]) => `- ${category}: ${skills.join(', ')}`);
  }

  private toSkillInfo(skill: Skill): SkillInfo {
    return {
      id: skill.id,
      name: skill.name,
      category: skill.category,
      description: skill.description,
      aliases: [...skill.aliases],
      prerequisites: this.store.resolveIds(skill.parentSkills).map((parent) => parent.name),
      leadsTo: this.store.resolveIds(skill.childSkills).map((child) => child.name),
      relatedSkills: this.store.resolveIds(skill.relatedSkills).map((related) => related.name),
      marketDemand: skill.marketDemand,
      learningPath: skill.learningPath,
      bestPractices: [...skill.bestPractices],
      cvTips: skill.cvTips,
      salaryRange: skill.salaryRange,
      experienceLevel: skill.experienceLevel
    };
  }
}
