// =============================================================================
// PATHGUARD — Tag Vocabulary Registry
//
// Loads the folder naming convention once at startup and freezes it.
// Every lookup is normalized (upper-case, separators and punctuation
// removed) and exact; there is no fuzzy matching.
//
// A malformed vocabulary is a ConfigurationError. Conflicting entries are
// never resolved by picking one of them.
// =============================================================================

import fs from 'fs';
import { ConfigurationError, errorMessage } from '../types/errors';
import {
  RawHierarchyFamily,
  RawRoleDefinition,
  RawVocabulary,
  RoleDefinition,
  TagVocabulary,
} from '../types/vocabulary';

/**
 * Canonical form of a tag or folder name: alphanumerics only, upper-case.
 * "c-level" → "CLEVEL", "Lead Docs" → "LEADDOCS".
 */
export function normalizeTag(value: string): string {
  return value.replace(/[^a-zA-Z0-9]/g, '').toUpperCase();
}

type Dimension = 'department' | 'hierarchy' | 'role folder' | 'project root';

/**
 * Validate a parsed vocabulary document and build the frozen registry.
 * @throws ConfigurationError
 */
export function buildVocabulary(input: unknown): TagVocabulary {
  const raw = parseRawVocabulary(input);

  // Which dimension claimed each normalized token first
  const claims = new Map<string, Dimension>();
  const claim = (token: string, dimension: Dimension, original: string): void => {
    const existing = claims.get(token);
    if (existing && existing !== dimension) {
      throw new ConfigurationError(
        `Token "${original}" is both a ${existing} and a ${dimension}`
      );
    }
    claims.set(token, dimension);
  };

  const ranks = raw.hierarchy.map((family) => family.rank);
  if (ranks.length === 0) {
    throw new ConfigurationError('Vocabulary defines no hierarchy families');
  }
  const maxRank = Math.max(...ranks);

  if (raw.adminRank !== maxRank) {
    throw new ConfigurationError(
      `adminRank ${raw.adminRank} must equal the highest hierarchy rank (${maxRank})`
    );
  }
  if (raw.defaultHierarchyLevel > maxRank) {
    throw new ConfigurationError(
      `defaultHierarchyLevel ${raw.defaultHierarchyLevel} exceeds the highest rank (${maxRank})`
    );
  }

  const departments = new Set<string>();
  for (const department of raw.departments) {
    const tag = requireTag(department, 'departments');
    claim(tag, 'department', department);
    departments.add(tag);
  }

  const hierarchyTokens = new Map<string, number>();
  for (const family of raw.hierarchy) {
    for (const token of family.tokens) {
      const tag = requireTag(token, 'hierarchy.tokens');
      claim(tag, 'hierarchy', token);
      const existing = hierarchyTokens.get(tag);
      if (existing !== undefined && existing !== family.rank) {
        throw new ConfigurationError(
          `Hierarchy token "${token}" is mapped to ranks ${existing} and ${family.rank}`
        );
      }
      hierarchyTokens.set(tag, family.rank);
    }
  }

  const roleFolders = new Map<string, RoleDefinition>();
  for (const definition of raw.roles) {
    const folder = requireTag(definition.folder, 'roles.folder');
    claim(folder, 'role folder', definition.folder);
    const role = requireTag(definition.role, 'roles.role');
    if (definition.rankSubstitute !== null && definition.rankSubstitute > maxRank) {
      throw new ConfigurationError(
        `Role "${definition.role}" has rankSubstitute ${definition.rankSubstitute} above the highest rank (${maxRank})`
      );
    }
    const existing = roleFolders.get(folder);
    if (
      existing &&
      (existing.role !== role || existing.rankSubstitute !== definition.rankSubstitute)
    ) {
      throw new ConfigurationError(
        `Role folder "${definition.folder}" is defined twice with different roles`
      );
    }
    roleFolders.set(folder, Object.freeze({ role, rankSubstitute: definition.rankSubstitute }));
  }

  const projectRoots = new Set<string>();
  for (const root of raw.projectRoots) {
    const tag = requireTag(root, 'projectRoots');
    claim(tag, 'project root', root);
    projectRoots.add(tag);
  }

  return Object.freeze({
    departments,
    hierarchyTokens,
    roleFolders,
    projectRoots,
    defaultDepartment: requireTag(raw.defaultDepartment, 'defaultDepartment'),
    defaultRole: requireTag(raw.defaultRole, 'defaultRole'),
    defaultHierarchyLevel: raw.defaultHierarchyLevel,
    adminRank: raw.adminRank,
    maxRank,
  });
}

/**
 * Read and build the vocabulary from a JSON file.
 * @throws ConfigurationError when the file is missing, not JSON, or invalid
 */
export function loadVocabulary(filePath: string): TagVocabulary {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read vocabulary file ${filePath}: ${errorMessage(err)}`
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(
      `Vocabulary file ${filePath} is not valid JSON: ${errorMessage(err)}`
    );
  }

  return buildVocabulary(parsed);
}

// ── Lookups ────────────────────────────────────────────────────────────

export function lookupDepartment(vocabulary: TagVocabulary, segment: string): string | null {
  const tag = normalizeTag(segment);
  return vocabulary.departments.has(tag) ? tag : null;
}

export function lookupHierarchyToken(vocabulary: TagVocabulary, segment: string): number | null {
  return vocabulary.hierarchyTokens.get(normalizeTag(segment)) ?? null;
}

export function lookupRoleFolder(vocabulary: TagVocabulary, segment: string): RoleDefinition | null {
  return vocabulary.roleFolders.get(normalizeTag(segment)) ?? null;
}

export function isProjectRoot(vocabulary: TagVocabulary, segment: string): boolean {
  return vocabulary.projectRoots.has(normalizeTag(segment));
}

// ── Shape validation ───────────────────────────────────────────────────

function parseRawVocabulary(input: unknown): RawVocabulary {
  if (!isRecord(input)) {
    throw new ConfigurationError('Vocabulary must be a JSON object');
  }

  return {
    departments: stringArray(input.departments, 'departments'),
    hierarchy: arrayOf(input.hierarchy, 'hierarchy', parseFamily),
    roles: arrayOf(input.roles, 'roles', parseRole),
    projectRoots: stringArray(input.projectRoots, 'projectRoots'),
    defaultDepartment: stringField(input.defaultDepartment, 'defaultDepartment'),
    defaultRole: stringField(input.defaultRole, 'defaultRole'),
    defaultHierarchyLevel: rankField(input.defaultHierarchyLevel, 'defaultHierarchyLevel'),
    adminRank: rankField(input.adminRank, 'adminRank'),
  };
}

function parseFamily(value: unknown, field: string): RawHierarchyFamily {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${field} must be an object`);
  }
  return {
    rank: rankField(value.rank, `${field}.rank`),
    tokens: stringArray(value.tokens, `${field}.tokens`),
  };
}

function parseRole(value: unknown, field: string): RawRoleDefinition {
  if (!isRecord(value)) {
    throw new ConfigurationError(`${field} must be an object`);
  }
  return {
    folder: stringField(value.folder, `${field}.folder`),
    role: stringField(value.role, `${field}.role`),
    rankSubstitute:
      value.rankSubstitute === null || value.rankSubstitute === undefined
        ? null
        : rankField(value.rankSubstitute, `${field}.rankSubstitute`),
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function arrayOf<T>(value: unknown, field: string, parse: (item: unknown, field: string) => T): T[] {
  if (!Array.isArray(value)) {
    throw new ConfigurationError(`${field} must be an array`);
  }
  return value.map((item, i) => parse(item, `${field}[${i}]`));
}

function stringArray(value: unknown, field: string): string[] {
  return arrayOf(value, field, stringField);
}

function stringField(value: unknown, field: string): string {
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${field} must be a string`);
  }
  return value;
}

function rankField(value: unknown, field: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${field} must be a non-negative integer`);
  }
  return value;
}

function requireTag(value: string, field: string): string {
  const tag = normalizeTag(value);
  if (!tag) {
    throw new ConfigurationError(`${field} contains "${value}", which has no letters or digits`);
  }
  return tag;
}
