import { badRequestError, notFoundError } from '@skillgap/common';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

import type { SkillsServiceConfig } from './config';
import type { SkillsEngine } from './engine';
import { parseSkillList } from './ontology/skill-normalizer';
import {
  contextBodySchema,
  extractBodySchema,
  gapAnalysisBodySchema,
  knowledgeSearchBodySchema,
  listSkillsQuerySchema,
  normalizeBodySchema,
  searchSkillsQuerySchema,
  skillParamsSchema
} from './schemas';

interface RegisterRoutesOptions {
  engine: SkillsEngine;
  config: SkillsServiceConfig;
}

export async function registerRoutes(app: FastifyInstance, dependencies: RegisterRoutesOptions): Promise<void> {
  const { engine, config } = dependencies;
  const serviceName = config.base.runtime.serviceName;

  const readinessHandler = async (_request: FastifyRequest, reply: FastifyReply) => {
    if (!engine.retriever.isInitialized()) {
      reply.status(503);
      return { status: 'initializing', service: serviceName };
    }

    return { status: 'ready', service: serviceName, documents: engine.retriever.size() };
  };

  app.get('/ready', readinessHandler);

  app.get('/v1/skills', async (request) => {
    const { category } = listSkillsQuerySchema.parse(request.query);
    if (!category) {
      const skills = engine.store.all();
      return { skills, total: skills.length };
    }

    const known = engine.store.categories().some((entry) => entry.toLowerCase() === category.toLowerCase());
    if (!known) {
      throw badRequestError(`Unknown skill category "${category}".`, { categories: engine.store.categories() });
    }

    const skills = engine.store.byCategory(category);
    return { skills, total: skills.length };
  });

  app.get('/v1/skills/search', async (request) => {
    const { q } = searchSkillsQuerySchema.parse(request.query);
    const skills = engine.store.search(q);
    return { skills, total: skills.length };
  });

  app.get('/v1/skills/:name', async (request) => {
    const { name } = skillParamsSchema.parse(request.params);
    const skill = engine.analyzer.enrichSkill(name);
    if (!skill) {
      throw notFoundError(`Skill "${name}" is not in the ontology.`);
    }
    return skill;
  });

  app.post('/v1/skills/normalize', async (request) => {
    const body = normalizeBodySchema.parse(request.body);
    const skills = parseSkillList(body.skills, 'skills');
    return { skills: engine.normalizer.normalizeList(skills, body.source) };
  });

  app.post('/v1/skills/extract', async (request) => {
    const body = extractBodySchema.parse(request.body);
    return { skills: engine.normalizer.extractFromText(body.text, body.source) };
  });

  app.post('/v1/gap-analysis', async (request) => {
    const body = gapAnalysisBodySchema.parse(request.body);
    const candidateSkills = parseSkillList(body.candidateSkills, 'candidateSkills');
    const requiredSkills = parseSkillList(body.requiredSkills, 'requiredSkills');

    const report = engine.analyzer.analyze(candidateSkills, requiredSkills);
    return {
      report,
      recommendations: engine.analyzer.learningRecommendations(report.missingSkills)
    };
  });

  app.post('/v1/knowledge/search', async (request) => {
    const body = knowledgeSearchBodySchema.parse(request.body);
    const results = await engine.retriever.search(body.query, body.topK, body.type);

    return {
      results: results.map(({ document, score }) => ({ ...document, score })),
      total: results.length
    };
  });

  app.post('/v1/context', async (request) => {
    const body = contextBodySchema.parse(request.body);
    const candidateSkills = parseSkillList(body.candidateSkills, 'candidateSkills');
    const requiredSkills = parseSkillList(body.requiredSkills, 'requiredSkills');

    const report = engine.analyzer.analyze(candidateSkills, requiredSkills);
    const built = await engine.contextBuilder.buildContext({
      gap: report,
      targetRole: body.targetRole,
      useEmbeddings: body.useEmbeddings
    });

    return { ...built, report };
  });
}
