/**
 * Ontology Store
 *
 * Read-only registry of canonical skills, built once from a definition table.
 * Three lowercase indices (canonical name, alias, keyword) point at the same
 * frozen Skill records so any mention resolves in O(1).
 *
 * Usage:
 * ```typescript
 * const store = loadDefaultOntology();
 * store.get('k8s')?.name;          // 'Kubernetes'
 * store.lookup('reactjs');         // { skill: React, matchedBy: 'alias' }
 * store.byCategory('Database');    // [PostgreSQL, MySQL, ...]
 * ```
 */

import { getLogger } from '@skillgap/common';
import type { Logger } from 'pino';

import skillTable from '../../data/skills.json';
import {
  SKILL_CATEGORIES,
  skillTableSchema,
  type Skill,
  type SkillCategory,
  type SkillDefinition
} from './types';

export type MatchTier = 'name' | 'alias' | 'keyword';

export interface SkillLookup {
  skill: Skill;
  matchedBy: MatchTier;
}

export interface OntologyExport {
  categories: SkillCategory[];
  skills: Skill[];
}

export interface BuildOntologyOptions {
  logger?: Logger;
}

/**
 * Raised while building the store when lookups would be ambiguous.
 * The store is never returned in that case.
 */
export class OntologyConsistencyError extends Error {
  public readonly issues: readonly string[];

  constructor(issues: string[]) {
    super(`Skill ontology is inconsistent: ${issues.join('; ')}`);
    this.name = 'OntologyConsistencyError';
    this.issues = issues;
  }
}

function toKey(value: string): string {
  return value.trim().toLowerCase();
}

function freezeSkill(skill: Skill): Skill {
  return Object.freeze({
    ...skill,
    aliases: Object.freeze([...skill.aliases]),
    keywords: Object.freeze([...skill.keywords]),
    parentSkills: Object.freeze([...skill.parentSkills]),
    childSkills: Object.freeze([...skill.childSkills]),
    relatedSkills: Object.freeze([...skill.relatedSkills]),
    bestPractices: Object.freeze([...skill.bestPractices])
  });
}

export class OntologyStore {
  private readonly skillList: readonly Skill[];
  private readonly byId: ReadonlyMap<string, Skill>;
  private readonly byName: ReadonlyMap<string, Skill>;
  private readonly byAlias: ReadonlyMap<string, Skill>;
  private readonly byKeyword: ReadonlyMap<string, Skill>;

  constructor(indices: {
    skills: readonly Skill[];
    byId: ReadonlyMap<string, Skill>;
    byName: ReadonlyMap<string, Skill>;
    byAlias: ReadonlyMap<string, Skill>;
    byKeyword: ReadonlyMap<string, Skill>;
  }) {
    this.skillList = Object.freeze([...indices.skills]);
    this.byId = indices.byId;
    this.byName = indices.byName;
    this.byAlias = indices.byAlias;
    this.byKeyword = indices.byKeyword;
  }

  get size(): number {
    return this.skillList.length;
  }

  /**
   * Case-insensitive lookup: canonical name first, then aliases, then keywords.
   */
  lookup(name: string): SkillLookup | null {
    const key = toKey(name);
    if (key.length === 0) {
      return null;
    }

    const byName = this.byName.get(key);
    if (byName) {
      return { skill: byName, matchedBy: 'name' };
    }

    const byAlias = this.byAlias.get(key);
    if (byAlias) {
      return { skill: byAlias, matchedBy: 'alias' };
    }

    const byKeyword = this.byKeyword.get(key);
    if (byKeyword) {
      return { skill: byKeyword, matchedBy: 'keyword' };
    }

    return null;
  }

  get(name: string): Skill | null {
    return this.lookup(name)?.skill ?? null;
  }

  has(name: string): boolean {
    return this.lookup(name) !== null;
  }

  getById(id: string): Skill | null {
    return this.byId.get(id) ?? null;
  }

  /** Known skills for the given identifiers, in input order. Dangling references are dropped. */
  resolveIds(ids: readonly string[]): Skill[] {
    const resolved: Skill[] = [];
    for (const id of ids) {
      const skill = this.byId.get(id);
      if (skill) {
        resolved.push(skill);
      }
    }
    return resolved;
  }

  all(): readonly Skill[] {
    return this.skillList;
  }

  byCategory(category: SkillCategory | string): Skill[] {
    const wanted = toKey(category);
    return this.skillList.filter((skill) => skill.category.toLowerCase() === wanted);
  }

  categories(): SkillCategory[] {
    return [...SKILL_CATEGORIES];
  }

  /** Substring search over names, aliases and keywords, in registration order. */
  search(query: string): Skill[] {
    const needle = toKey(query);
    if (needle.length === 0) {
      return [];
    }

    return this.skillList.filter(
      (skill) =>
        skill.name.toLowerCase().includes(needle) ||
        skill.aliases.some((alias) => alias.toLowerCase().includes(needle)) ||
        skill.keywords.some((keyword) => keyword.toLowerCase().includes(needle))
    );
  }

  toJSON(): OntologyExport {
    return {
      categories: this.categories(),
      skills: [...this.skillList]
    };
  }
}

/**
 * Validate a definition table and build the store.
 * Throws OntologyConsistencyError on malformed rows, duplicate identifiers or names,
 * aliases claimed by two skills, and aliases that shadow another skill's canonical name.
 */
export function buildOntologyStore(
  definitions: readonly SkillDefinition[] | unknown,
  options: BuildOntologyOptions = {}
): OntologyStore {
  const logger = options.logger ?? getLogger({ module: 'ontology-store' });
  const parsed = skillTableSchema.safeParse(definitions);

  if (!parsed.success) {
    throw new OntologyConsistencyError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }

  const issues: string[] = [];
  const skills: Skill[] = [];
  const byId = new Map<string, Skill>();
  const byName = new Map<string, Skill>();
  const byAlias = new Map<string, Skill>();
  const byKeyword = new Map<string, Skill>();

  for (const definition of parsed.data) {
    if (byId.has(definition.id)) {
      issues.push(`duplicate skill id "${definition.id}"`);
      continue;
    }

    const skill = freezeSkill(definition);
    const nameKey = toKey(skill.name);
    const existingName = byName.get(nameKey);
    if (existingName) {
      issues.push(`canonical name "${skill.name}" used by both "${existingName.id}" and "${skill.id}"`);
      continue;
    }

    byId.set(skill.id, skill);
    byName.set(nameKey, skill);
    skills.push(skill);
  }

  // Names are all registered before aliases so shadowing is caught regardless of table order.
  for (const skill of skills) {
    for (const alias of skill.aliases) {
      const key = toKey(alias);
      const owner = byName.get(key);
      if (owner && owner.id !== skill.id) {
        issues.push(`alias "${alias}" of "${skill.id}" shadows canonical name of "${owner.id}"`);
        continue;
      }

      const claimed = byAlias.get(key);
      if (claimed && claimed.id !== skill.id) {
        issues.push(`alias "${alias}" claimed by both "${claimed.id}" and "${skill.id}"`);
        continue;
      }

      if (!owner) {
        byAlias.set(key, skill);
      }
    }
  }

  if (issues.length > 0) {
    throw new OntologyConsistencyError(issues);
  }

  let overlappingKeywords = 0;
  for (const skill of skills) {
    for (const keyword of skill.keywords) {
      const key = toKey(keyword);
      const owner = byKeyword.get(key);
      if (!owner) {
        byKeyword.set(key, skill);
      } else if (owner.id !== skill.id) {
        overlappingKeywords += 1;
        logger.debug({ keyword, owner: owner.id, ignored: skill.id }, 'Keyword already owned by another skill');
      }
    }
  }

  logger.debug(
    {
      skills: skills.length,
      aliases: byAlias.size,
      keywords: byKeyword.size,
      overlappingKeywords
    },
    'Ontology store built'
  );

  return new OntologyStore({ skills, byId, byName, byAlias, byKeyword });
}

let defaultOntology: OntologyStore | null = null;

/** Build the store from the bundled skill table on first call; later calls return the same store. */
export function loadDefaultOntology(options: BuildOntologyOptions = {}): OntologyStore {
  if (!defaultOntology) {
    defaultOntology = buildOntologyStore(skillTable, options);
  }

  return defaultOntology;
}
