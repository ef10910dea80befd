import { getLogger } from '@skillgap/common';
import type { Logger } from 'pino';

import type { GapAnalyzer } from './gap-analyzer';
import { isHighDemand } from './ontology/types';
import type { KnowledgeRetriever } from './retrieval/knowledge-retriever';
import type { CareerPath, GapReport, ResumeTip, RetrievalResult, SkillInfo } from './types';

const MAX_SKILL_KNOWLEDGE = 10;
const MISSING_SKILLS_IN_CONTEXT = 5;
const CAREER_PATHS_IN_CONTEXT = 2;
const TIPS_IN_CONTEXT = 3;
const SEMANTIC_HITS_IN_CONTEXT = 3;

export type ContextMode = 'semantic' | 'simple';

export interface ContextRequest {
  gap: GapReport;
  targetRole: string;
}

export interface BuiltContext {
  context: string;
  mode: ContextMode;
}

export interface ContextBuilderDeps {
  analyzer: GapAnalyzer;
  retriever: KnowledgeRetriever;
  careerPaths: readonly CareerPath[];
  resumeTips: readonly ResumeTip[];
  logger?: Logger;
}

function words(value: string): Set<string> {
  return new Set(value.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []);
}

function overlap(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  let count = 0;
  for (const word of a) {
    if (b.has(word)) count += 1;
  }
  return count;
}

function truncate(value: string, limit: number): string {
  return value.length > limit ? `${value.slice(0, limit).trimEnd()}...` : value;
}

/**
 * Assembles the plain-text context handed to a downstream text generator:
 * the gap report plus whatever knowledge the tables and the retriever can add.
 */
export class ContextBuilder {
  private readonly logger: Logger;

  constructor(private readonly deps: ContextBuilderDeps) {
    this.logger = deps.logger ?? getLogger({ module: 'context-builder' });
  }

  /**
   * Career paths whose title shares a word with the role, best overlap first.
   * Level words ("senior", "junior") break ties.
   */
  retrieveCareerAdvice(targetRole: string): CareerPath[] {
    const roleWords = words(targetRole);

    return this.deps.careerPaths
      .map((path, position) => ({
        path,
        position,
        titleOverlap: overlap(words(path.path), roleWords),
        levelOverlap: overlap(words(path.level), roleWords)
      }))
      .filter((entry) => entry.titleOverlap > 0)
      .sort(
        (a, b) =>
          b.titleOverlap - a.titleOverlap || b.levelOverlap - a.levelOverlap || a.position - b.position
      )
      .map((entry) => entry.path);
  }

  async retrieveResumeTips(context = 'general', topK = 5): Promise<ResumeTip[]> {
    const general = this.deps.resumeTips.filter((tip) => isHighDemand(tip.impact)).slice(0, topK);
    if (context === 'general') {
      return general;
    }

    const results = await this.deps.retriever.search(context, topK, 'resume_tip');
    const tips = results
      .map((result) => this.deps.resumeTips.find((tip) => tip.id === result.document.metadata.tipId))
      .filter((tip): tip is ResumeTip => tip !== undefined);

    return tips.length > 0 ? tips : general;
  }

  retrieveSkillKnowledge(skillNames: readonly string[]): SkillInfo[] {
    return skillNames
      .slice(0, MAX_SKILL_KNOWLEDGE)
      .map((name) => this.deps.analyzer.enrichSkill(name))
      .filter((info): info is SkillInfo => info !== null);
  }

  async buildRagContext(request: ContextRequest): Promise<string> {
    const hits = await this.deps.retriever.search(this.semanticQuery(request), SEMANTIC_HITS_IN_CONTEXT);
    return this.renderRagContext(request, hits);
  }

  buildSimpleContext(gap: GapReport): string {
    const lines: string[] = [this.deps.analyzer.formatGapForPrompt(gap), '', '## Skill knowledge'];

    const missing = this.retrieveSkillKnowledge(gap.missingSkills.slice(0, MISSING_SKILLS_IN_CONTEXT));
    if (missing.length > 0) {
      lines.push('Missing skills to learn:');
      for (const skill of missing) {
        lines.push(
          `- ${skill.name}: ${truncate(skill.description, 100)}`,
          `  Learning: ${truncate(skill.learningPath, 80)}`,
          `  CV tip: ${truncate(skill.cvTips, 80)}`
        );
      }
    }

    lines.push('', 'Key resume tips:');
    for (const tip of this.deps.resumeTips.slice(0, TIPS_IN_CONTEXT)) {
      lines.push(`- ${tip.title}: ${truncate(tip.description, 80)}`);
    }

    return lines.join('\n');
  }

  /**
   * Semantic context when requested and the retriever has something to say,
   * the table-only context otherwise.
   */
  async buildContext(request: ContextRequest & { useEmbeddings?: boolean }): Promise<BuiltContext> {
    if (request.useEmbeddings ?? true) {
      try {
        const hits = await this.deps.retriever.search(this.semanticQuery(request), SEMANTIC_HITS_IN_CONTEXT);
        if (hits.length > 0) {
          return { context: await this.renderRagContext(request, hits), mode: 'semantic' };
        }
        this.logger.debug({ targetRole: request.targetRole }, 'No semantic hits; using simple context');
      } catch (error) {
        this.logger.warn({ error }, 'Semantic context failed; falling back to simple context');
      }
    }

    return { context: this.buildSimpleContext(request.gap), mode: 'simple' };
  }

  private semanticQuery({ gap, targetRole }: ContextRequest): string {
    return [targetRole, ...gap.missingSkills.slice(0, MISSING_SKILLS_IN_CONTEXT)].join(' ').trim();
  }

  private async renderRagContext(request: ContextRequest, hits: readonly RetrievalResult[]): Promise<string> {
    const { gap, targetRole } = request;
    const lines: string[] = [this.deps.analyzer.formatGapForPrompt(gap)];

    const missing = this.retrieveSkillKnowledge(gap.missingSkills.slice(0, MISSING_SKILLS_IN_CONTEXT));
    if (missing.length > 0) {
      lines.push('', '## Knowledge about missing skills');
      for (const skill of missing) {
        lines.push(
          `- ${skill.name} (${skill.category})`,
          `  Description: ${skill.description}`,
          `  Learning path: ${skill.learningPath}`,
          `  CV tip: ${skill.cvTips}`,
          `  Market demand: ${skill.marketDemand}`
        );
      }
    }

    const careerPaths = this.retrieveCareerAdvice(targetRole).slice(0, CAREER_PATHS_IN_CONTEXT);
    if (careerPaths.length > 0) {
      lines.push('', '## Career path advice');
      for (const path of careerPaths) {
        lines.push(
          `- ${path.path} (${path.level})`,
          `  Required: ${path.requiredSkills.join(', ')}`,
          `  Salary: ${path.salaryRange}`,
          `  Focus: ${path.focus}`,
          `  Next: ${path.nextStep}`
        );
      }
    }

    const tips = await this.retrieveResumeTips('general', TIPS_IN_CONTEXT);
    if (tips.length > 0) {
      lines.push('', '## Resume improvement tips');
      for (const tip of tips) {
        lines.push(`- ${tip.title}`, `  ${tip.description}`, `  Example: ${tip.examples[0] ?? 'n/a'}`);
      }
    }

    if (hits.length > 0) {
      lines.push('', '## Related knowledge');
      for (const hit of hits) {
        lines.push(`- [${hit.document.type}] ${hit.document.content.split('\n')[0]} (score ${hit.score.toFixed(2)})`);
      }
    }

    return lines.join('\n');
  }
}
