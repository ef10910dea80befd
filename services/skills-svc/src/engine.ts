import { getLogger } from '@skillgap/common';
import type { Logger } from 'pino';

import type { SkillsServiceConfig } from './config';
import { ContextBuilder } from './context-builder';
import { createEmbedder } from './embeddings';
import { GapAnalyzer } from './gap-analyzer';
import { loadDefaultOntology, type OntologyStore } from './ontology/ontology-store';
import { SkillNormalizer } from './ontology/skill-normalizer';
import { loadCareerPaths, loadResumeTips } from './retrieval/knowledge-base';
import { KnowledgeRetriever } from './retrieval/knowledge-retriever';
import type { CareerPath, Embedder, ResumeTip } from './types';

export interface SkillsEngine {
  store: OntologyStore;
  normalizer: SkillNormalizer;
  analyzer: GapAnalyzer;
  retriever: KnowledgeRetriever;
  contextBuilder: ContextBuilder;
}

export interface SkillsEngineOverrides {
  store?: OntologyStore;
  embedder?: Embedder;
  careerPaths?: readonly CareerPath[];
  resumeTips?: readonly ResumeTip[];
  logger?: Logger;
}

/** Wires the engine components around one shared ontology store. */
export function createSkillsEngine(config: SkillsServiceConfig, overrides: SkillsEngineOverrides = {}): SkillsEngine {
  const logger = overrides.logger ?? getLogger({ module: 'skills-engine' });
  const store = overrides.store ?? loadDefaultOntology({ logger: logger.child({ module: 'ontology-store' }) });
  const careerPaths = overrides.careerPaths ?? loadCareerPaths();
  const resumeTips = overrides.resumeTips ?? loadResumeTips();
  const embedder = overrides.embedder ?? createEmbedder(config.embedding, logger.child({ module: 'embedder' }));

  const normalizer = new SkillNormalizer(store, logger.child({ module: 'skill-normalizer' }));
  const analyzer = new GapAnalyzer(store, normalizer, {
    relatedBonusPerEntry: config.gap.relatedBonusPerEntry,
    logger: logger.child({ module: 'gap-analyzer' })
  });
  const retriever = new KnowledgeRetriever(
    { store, careerPaths, resumeTips, embedder, logger },
    {
      defaultTopK: config.retrieval.defaultTopK,
      maxTopK: config.retrieval.maxTopK,
      ingestConcurrency: config.retrieval.ingestConcurrency,
      maxInputCharacters: config.retrieval.maxInputCharacters
    }
  );
  const contextBuilder = new ContextBuilder({
    analyzer,
    retriever,
    careerPaths,
    resumeTips,
    logger: logger.child({ module: 'context-builder' })
  });

  logger.info({ skills: store.size, embedder: embedder.name }, 'Skills engine assembled');

  return { store, normalizer, analyzer, retriever, contextBuilder };
}
