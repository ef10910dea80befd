import { z } from 'zod';

import { KNOWLEDGE_DOCUMENT_TYPES } from './retrieval/knowledge-base';

const skillSourceSchema = z.enum(['cv', 'jd', 'text', 'unknown']);

// Skill lists stay unknown here; parseSkillList reports the offending entry.
export const normalizeBodySchema = z.object({
  skills: z.unknown(),
  source: skillSourceSchema.optional()
});

export const extractBodySchema = z.object({
  text: z.string().max(100_000),
  source: skillSourceSchema.optional()
});

export const gapAnalysisBodySchema = z.object({
  candidateSkills: z.unknown(),
  requiredSkills: z.unknown()
});

export const knowledgeSearchBodySchema = z.object({
  query: z.string().trim().min(1).max(2_000),
  topK: z.number().int().min(0).optional(),
  type: z.enum(KNOWLEDGE_DOCUMENT_TYPES).optional()
});

export const contextBodySchema = gapAnalysisBodySchema.extend({
  targetRole: z.string().trim().min(1).max(200),
  useEmbeddings: z.boolean().optional()
});

export const listSkillsQuerySchema = z.object({
  category: z.string().trim().min(1).optional()
});

export const searchSkillsQuerySchema = z.object({
  q: z.string().trim().min(1).max(200)
});

export const skillParamsSchema = z.object({
  name: z.string().trim().min(1)
});
