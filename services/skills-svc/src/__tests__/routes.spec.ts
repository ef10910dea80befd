import { buildServer, resetConfigForTesting, resetLoggerForTesting } from '@skillgap/common';
import type { FastifyInstance } from 'fastify';
import pino from 'pino';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { getSkillsServiceConfig, resetSkillsServiceConfig } from '../config';
import { LocalDeterministicEmbedder } from '../embeddings';
import { createSkillsEngine, type SkillsEngine } from '../engine';
import { registerRoutes } from '../routes';

const CANDIDATE = ['Python', 'Django', 'PostgreSQL', 'Git', 'Docker', 'REST API', 'Redis'];
const REQUIRED = ['Python', 'Go', 'Kubernetes', 'AWS', 'Microservices', 'Redis', 'Kafka', 'Docker'];

describe('skills routes', () => {
  let server: FastifyInstance;
  let engine: SkillsEngine;

  beforeEach(async () => {
    delete process.env.SERVICE_NAME;
    process.env.ENABLE_REQUEST_LOGGING = 'false';
    process.env.LOG_LEVEL = 'silent';
    resetConfigForTesting();
    resetLoggerForTesting();
    resetSkillsServiceConfig();

    const config = getSkillsServiceConfig();
    engine = createSkillsEngine(config, {
      embedder: new LocalDeterministicEmbedder(),
      logger: pino({ level: 'silent' })
    });

    server = await buildServer({ disableDefaultReadyRoute: true });
    await registerRoutes(server, { engine, config });
  });

  afterEach(async () => {
    await server.close();
    delete process.env.ENABLE_REQUEST_LOGGING;
    delete process.env.LOG_LEVEL;
    resetConfigForTesting();
    resetLoggerForTesting();
    resetSkillsServiceConfig();
  });

  it('reports readiness once the knowledge index is built', async () => {
    const before = await server.inject({ method: 'GET', url: '/ready' });
    expect(before.statusCode).toBe(503);
    expect(before.json()).toEqual({ status: 'initializing', service: 'skillgap-service' });

    await engine.retriever.initialize();

    const after = await server.inject({ method: 'GET', url: '/ready' });
    expect(after.statusCode).toBe(200);
    expect(after.json()).toEqual({ status: 'ready', service: 'skillgap-service', documents: 57 });
  });

  it('keeps the default health route', async () => {
    const response = await server.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok', service: 'skillgap-service' });
  });

  it('lists skills, optionally by category', async () => {
    const all = await server.inject({ method: 'GET', url: '/v1/skills' });
    expect(all.json().total).toBe(42);

    const cloud = await server.inject({ method: 'GET', url: '/v1/skills?category=cloud' });
    expect(cloud.statusCode).toBe(200);
    expect(cloud.json().skills.map((skill: { name: string }) => skill.name)).toEqual([
      'AWS',
      'Google Cloud Platform',
      'Microsoft Azure'
    ]);
  });

  it('rejects unknown categories', async () => {
    const response = await server.inject({ method: 'GET', url: '/v1/skills?category=Astrology' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: 'bad_request', message: 'Unknown skill category "Astrology".' });
  });

  it('searches skills by substring', async () => {
    const response = await server.inject({ method: 'GET', url: '/v1/skills/search?q=script' });

    expect(response.json().skills.map((skill: { name: string }) => skill.name)).toEqual([
      'JavaScript',
      'TypeScript',
      'Node.js'
    ]);
    expect(response.json().total).toBe(3);
  });

  it('requires a search term', async () => {
    const response = await server.inject({ method: 'GET', url: '/v1/skills/search' });

    expect(response.statusCode).toBe(400);
    expect(response.json().message).toBe('Request validation failed.');
  });

  it('describes a skill by any of its names', async () => {
    const response = await server.inject({ method: 'GET', url: '/v1/skills/k8s' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ id: 'kubernetes', name: 'Kubernetes', prerequisites: ['Docker'] });
  });

  it('returns 404 for skills outside the ontology', async () => {
    const response = await server.inject({ method: 'GET', url: '/v1/skills/Cobol' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ code: 'not_found', message: 'Skill "Cobol" is not in the ontology.' });
  });

  it('normalizes skill lists', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/skills/normalize',
      payload: { skills: ['reactjs', 'k8s', 'Basket Weaving'], source: 'cv' }
    });

    expect(response.statusCode).toBe(200);
    expect(
      response.json().skills.map((skill: { normalizedName: string; matchedBy: string; source: string }) => [
        skill.normalizedName,
        skill.matchedBy,
        skill.source
      ])
    ).toEqual([
      ['React', 'alias', 'cv'],
      ['Kubernetes', 'alias', 'cv'],
      ['Basket Weaving', 'fallback', 'cv']
    ]);
  });

  it('names the offending entry of an invalid skill list', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/skills/normalize',
      payload: { skills: ['Go', 42] }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      code: 'bad_request',
      message: 'skills[1] must be a string.',
      details: { field: 'skills', index: 1 }
    });
  });

  it('extracts skills from free text', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/skills/extract',
      payload: { text: 'Built SPAs in JavaScript.' }
    });

    expect(response.json().skills).toEqual([
      {
        rawName: 'JavaScript',
        normalizedName: 'JavaScript',
        category: 'Programming Language',
        confidence: 1,
        inOntology: true,
        skillId: 'javascript',
        matchedBy: 'name',
        source: 'text'
      }
    ]);
  });

  it('analyzes the gap between two skill lists', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/gap-analysis',
      payload: { candidateSkills: CANDIDATE, requiredSkills: REQUIRED }
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.report).toMatchObject({
      matchingSkills: ['Python', 'Redis', 'Docker'],
      missingSkills: ['Go', 'Kubernetes', 'AWS', 'Microservices', 'Apache Kafka'],
      matchPercentage: 38.4,
      gapSeverity: 'critical'
    });
    expect(body.recommendations.map((entry: { skill: string }) => entry.skill)).toEqual([
      'Go',
      'Kubernetes',
      'AWS',
      'Microservices',
      'Apache Kafka'
    ]);
  });

  it('rejects a required list that is not an array', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/gap-analysis',
      payload: { candidateSkills: [], requiredSkills: 'Go' }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({
      code: 'bad_request',
      message: 'requiredSkills must be an array of strings.',
      details: { field: 'requiredSkills' }
    });
  });

  it('searches the knowledge index', async () => {
    const response = await server.inject({
      method: 'POST',
      url: '/v1/knowledge/search',
      payload: { query: 'quantify numbers achievements', topK: 1, type: 'resume_tip' }
    });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.total).toBe(1);
    expect(body.results[0]).toMatchObject({ id: 'tip_quantify', type: 'resume_tip' });
    expect(typeof body.results[0].score).toBe('number');
  });

  it('validates knowledge search requests', async () => {
    const blank = await server.inject({ method: 'POST', url: '/v1/knowledge/search', payload: { query: '   ' } });
    const badType = await server.inject({
      method: 'POST',
      url: '/v1/knowledge/search',
      payload: { query: 'docker', type: 'blog_post' }
    });

    expect(blank.statusCode).toBe(400);
    expect(badType.statusCode).toBe(400);
    expect(badType.json().details.issues[0].path).toBe('type');
  });

  it('builds generation context', async () => {
    const semantic = await server.inject({
      method: 'POST',
      url: '/v1/context',
      payload: { candidateSkills: CANDIDATE, requiredSkills: REQUIRED, targetRole: 'Senior Backend Developer' }
    });
    const simple = await server.inject({
      method: 'POST',
      url: '/v1/context',
      payload: {
        candidateSkills: CANDIDATE,
        requiredSkills: REQUIRED,
        targetRole: 'Senior Backend Developer',
        useEmbeddings: false
      }
    });

    expect(semantic.json().mode).toBe('semantic');
    expect(semantic.json().context).toContain('## Career path advice');
    expect(semantic.json().report.matchPercentage).toBe(38.4);
    expect(simple.json().mode).toBe('simple');
    expect(simple.json().context.split('\n')[0]).toBe('## Skill Gap Analysis');
  });
});
