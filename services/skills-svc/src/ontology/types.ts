import { z } from 'zod';

// Display values double as the wire format, so order here is the enumeration order.
export const SKILL_CATEGORIES = [
  'Programming Language',
  'Frontend Framework',
  'Backend Framework',
  'Database',
  'DevOps',
  'Cloud',
  'Architecture',
  'Message Queue',
  'Testing',
  'Mobile',
  'AI/ML',
  'Security',
  'Version Control',
  'Soft Skill',
  'Methodology',
  'Other'
] as const;

export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

export const MARKET_DEMAND_LEVELS = ['niche', 'low', 'medium', 'high', 'very_high'] as const;

export type MarketDemand = (typeof MARKET_DEMAND_LEVELS)[number];

export const EXPERIENCE_LEVELS = ['all', 'junior', 'mid', 'senior'] as const;

export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];

export interface Skill {
  readonly id: string;
  readonly name: string;
  readonly category: SkillCategory;
  readonly aliases: readonly string[];
  readonly keywords: readonly string[];
  /** Prerequisites, by identifier. */
  readonly parentSkills: readonly string[];
  /** Skills that build on this one, by identifier. */
  readonly childSkills: readonly string[];
  /** Lateral associations, by identifier. Not hierarchical. */
  readonly relatedSkills: readonly string[];
  readonly marketDemand: MarketDemand;
  readonly description: string;
  readonly learningPath: string;
  readonly bestPractices: readonly string[];
  readonly cvTips: string;
  readonly salaryRange: string;
  readonly experienceLevel: ExperienceLevel;
}

const stringList = z.array(z.string().trim().min(1)).default([]);

export const skillDefinitionSchema = z.object({
  id: z.string().trim().min(1),
  name: z.string().trim().min(1),
  category: z.enum(SKILL_CATEGORIES),
  aliases: stringList,
  keywords: stringList,
  parentSkills: stringList,
  childSkills: stringList,
  relatedSkills: stringList,
  marketDemand: z.enum(MARKET_DEMAND_LEVELS).default('medium'),
  description: z.string().default(''),
  learningPath: z.string().default(''),
  bestPractices: stringList,
  cvTips: z.string().default(''),
  salaryRange: z.string().default(''),
  experienceLevel: z.enum(EXPERIENCE_LEVELS).default('all')
});

export const skillTableSchema = z.array(skillDefinitionSchema);

/** Shape accepted by the ontology builder; optional fields take their defaults. */
export type SkillDefinition = z.input<typeof skillDefinitionSchema>;

export function isHighDemand(demand: MarketDemand): boolean {
  return demand === 'high' || demand === 'very_high';
}
