import type { MarketDemand, SkillCategory } from './ontology/types';

export type SkillSource = 'cv' | 'jd' | 'text' | 'unknown';

export type SkillMatchTier = 'name' | 'alias' | 'keyword' | 'pattern' | 'fallback';

export interface SkillMatch {
  rawName: string;
  /** Canonical display name, or the title-cased input when unresolved. */
  normalizedName: string;
  category: SkillCategory;
  confidence: number;
  inOntology: boolean;
  skillId: string | null;
  matchedBy: SkillMatchTier;
  source: SkillSource;
}

export type GapSeverity = 'low' | 'medium' | 'high' | 'critical';

export type CategoryBuckets = Record<string, string[]>;

export interface GapReport {
  readonly matchingSkills: readonly string[];
  readonly missingSkills: readonly string[];
  readonly extraSkills: readonly string[];
  /** Missing skill -> candidate skills related to it. */
  readonly relatedCoverage: Readonly<Record<string, readonly string[]>>;
  readonly matchPercentage: number;
  readonly gapSeverity: GapSeverity;
  readonly matchingByCategory: Readonly<CategoryBuckets>;
  readonly missingByCategory: Readonly<CategoryBuckets>;
  readonly highPriorityMissing: readonly string[];
  readonly quickWins: readonly string[];
}

export interface LearningRecommendation {
  skill: string;
  priority: 'high' | 'medium';
  learningPath: string;
  prerequisites: string[];
  relatedSkillsToLearn: string[];
  cvTip: string;
  marketDemand: MarketDemand;
}

export interface SkillInfo {
  id: string;
  name: string;
  category: SkillCategory;
  description: string;
  aliases: string[];
  prerequisites: string[];
  leadsTo: string[];
  relatedSkills: string[];
  marketDemand: MarketDemand;
  learningPath: string;
  bestPractices: string[];
  cvTips: string;
  salaryRange: string;
  experienceLevel: string;
}

export type KnowledgeDocumentType = 'skill' | 'career_path' | 'resume_tip';

export interface KnowledgeDocument {
  id: string;
  content: string;
  type: KnowledgeDocumentType;
  metadata: Record<string, unknown>;
}

export interface RetrievalResult {
  document: KnowledgeDocument;
  score: number;
}

export interface CareerPath {
  id: string;
  path: string;
  level: string;
  requiredSkills: string[];
  salaryRange: string;
  focus: string;
  nextStep: string;
}

export interface ResumeTip {
  id: string;
  category: string;
  title: string;
  description: string;
  examples: string[];
  impact: MarketDemand;
}

/** Text embedding capability. Resolves to null when no vector is available. */
export interface Embedder {
  readonly name: string;
  embed(text: string): Promise<number[] | null>;
}
