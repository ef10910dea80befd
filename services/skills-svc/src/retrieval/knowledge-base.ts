/**
 * Static knowledge tables and their rendering into retrievable documents.
 */

import { z } from 'zod';

import careerPathTable from '../../data/career-paths.json';
import resumeTipTable from '../../data/resume-tips.json';
import type { OntologyStore } from '../ontology/ontology-store';
import { MARKET_DEMAND_LEVELS, type Skill } from '../ontology/types';
import type { CareerPath, KnowledgeDocument, ResumeTip } from '../types';

export const KNOWLEDGE_DOCUMENT_TYPES = ['skill', 'career_path', 'resume_tip'] as const;

const careerPathSchema = z.object({
  id: z.string().min(1),
  path: z.string().min(1),
  level: z.string().min(1),
  requiredSkills: z.array(z.string()),
  salaryRange: z.string().default(''),
  focus: z.string().default(''),
  nextStep: z.string().default('')
});

const resumeTipSchema = z.object({
  id: z.string().min(1),
  category: z.string().min(1),
  title: z.string().min(1),
  description: z.string(),
  examples: z.array(z.string()).default([]),
  impact: z.enum(MARKET_DEMAND_LEVELS)
});

export function parseCareerPaths(value: unknown): CareerPath[] {
  return z.array(careerPathSchema).parse(value);
}

export function parseResumeTips(value: unknown): ResumeTip[] {
  return z.array(resumeTipSchema).parse(value);
}

let bundledCareerPaths: CareerPath[] | null = null;
let bundledResumeTips: ResumeTip[] | null = null;

export function loadCareerPaths(): CareerPath[] {
  if (!bundledCareerPaths) {
    bundledCareerPaths = parseCareerPaths(careerPathTable);
  }
  return bundledCareerPaths;
}

export function loadResumeTips(): ResumeTip[] {
  if (!bundledResumeTips) {
    bundledResumeTips = parseResumeTips(resumeTipTable);
  }
  return bundledResumeTips;
}

function line(label: string, value: string | readonly string[]): string | null {
  const text = typeof value === 'string' ? value : value.join(', ');
  return text.length > 0 ? `${label}: ${text}` : null;
}

function compact(lines: Array<string | null>): string {
  return lines.filter((entry): entry is string => entry !== null).join('\n');
}

export function renderSkillDocument(skill: Skill, store: OntologyStore): KnowledgeDocument {
  const names = (ids: readonly string[]): string[] => store.resolveIds(ids).map((entry) => entry.name);

  return {
    id: `skill_${skill.id}`,
    type: 'skill',
    content: compact([
      `Skill: ${skill.name}`,
      line('Category', skill.category),
      line('Description', skill.description),
      line('Also known as', skill.aliases),
      line('Prerequisites', names(skill.parentSkills)),
      line('Leads to', names(skill.childSkills)),
      line('Related', names(skill.relatedSkills)),
      line('Market demand', skill.marketDemand),
      line('Learning path', skill.learningPath),
      line('Best practices', skill.bestPractices),
      line('CV tips', skill.cvTips),
      line('Salary range', skill.salaryRange)
    ]),
    metadata: {
      skillId: skill.id,
      name: skill.name,
      category: skill.category,
      marketDemand: skill.marketDemand
    }
  };
}

export function renderCareerPathDocument(careerPath: CareerPath): KnowledgeDocument {
  return {
    id: `career_${careerPath.id}`,
    type: 'career_path',
    content: compact([
      `Career path: ${careerPath.path} (${careerPath.level})`,
      line('Required skills', careerPath.requiredSkills),
      line('Salary range', careerPath.salaryRange),
      line('Focus', careerPath.focus),
      line('Next step', careerPath.nextStep)
    ]),
    metadata: {
      careerPathId: careerPath.id,
      path: careerPath.path,
      level: careerPath.level
    }
  };
}

export function renderResumeTipDocument(tip: ResumeTip): KnowledgeDocument {
  return {
    id: `tip_${tip.id}`,
    type: 'resume_tip',
    content: compact([
      `Resume tip: ${tip.title}`,
      line('Category', tip.category),
      tip.description,
      ...tip.examples.map((example) => `- ${example}`)
    ]),
    metadata: {
      tipId: tip.id,
      category: tip.category,
      impact: tip.impact
    }
  };
}

/** Skills first (registration order), then career paths, then tips. */
export function buildKnowledgeDocuments(
  store: OntologyStore,
  careerPaths: readonly CareerPath[],
  resumeTips: readonly ResumeTip[]
): KnowledgeDocument[] {
  return [
    ...store.all().map((skill) => renderSkillDocument(skill, store)),
    ...careerPaths.map(renderCareerPathDocument),
    ...resumeTips.map(renderResumeTipDocument)
  ];
}
