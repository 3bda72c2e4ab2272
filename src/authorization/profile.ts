// =============================================================================
// PATHGUARD — User Profile Model
//
// Canonical form of user attributes, default profiles for new users, and the
// typed partial update applied by the administration operations.
//
// Validation happens here, at the profile boundary, so that the evaluator
// only ever sees well-formed profiles.
// =============================================================================

import { normalizeTag } from '../vocabulary';
import { ValidationError } from '../types/errors';
import {
  ContextualRoles,
  ProfileUpdate,
  StoredProfile,
  UserProfile,
} from '../types/permissions';
import { TagVocabulary } from '../types/vocabulary';

const UPDATE_FIELDS: ReadonlySet<string> = new Set(['hierarchyLevel', 'departments', 'projects', 'contextualRoles']);

/**
 * Canonical profile key: trimmed and lower-cased.
 * @throws ValidationError when the value is not an email address
 */
export function normalizeEmail(value: unknown): string {
  if (typeof value !== 'string') {
    throw new ValidationError('Email must be a string', 'email');
  }
  const email = value.trim().toLowerCase();
  if (!/^[^\s@]+@[^\s@]+$/.test(email)) {
    throw new ValidationError(`Invalid email address: "${value}"`, 'email');
  }
  return email;
}

/** Normalized, de-duplicated, sorted tag list */
export function toTagSet(values: Iterable<string>): string[] {
  const tags = new Set<string>();
  for (const value of values) {
    const tag = normalizeTag(value);
    if (tag) tags.add(tag);
  }
  return [...tags].sort();
}

/** Role map with normalized keys and values, keys sorted */
export function toContextualRoles(roles: ContextualRoles): ContextualRoles {
  const merged = new Map<string, string[]>();
  for (const [context, values] of Object.entries(roles)) {
    const key = normalizeTag(context);
    if (!key) continue;
    merged.set(key, toTagSet([...(merged.get(key) ?? []), ...values]));
  }

  const result: ContextualRoles = {};
  for (const key of [...merged.keys()].sort()) {
    result[key] = merged.get(key) ?? [];
  }
  return result;
}

/** Minimal profile for a user seen for the first time */
export function defaultProfile(email: string, vocabulary: TagVocabulary): StoredProfile {
  return {
    email,
    hierarchyLevel: vocabulary.defaultHierarchyLevel,
    departments: [],
    projects: [],
    contextualRoles: {},
  };
}

export function toUserProfile(stored: StoredProfile, vocabulary: TagVocabulary): UserProfile {
  return {
    email: stored.email,
    hierarchyLevel: stored.hierarchyLevel,
    departments: toTagSet(stored.departments),
    projects: toTagSet(stored.projects),
    contextualRoles: toContextualRoles(stored.contextualRoles),
    isAdmin: stored.hierarchyLevel === vocabulary.adminRank,
  };
}

/**
 * Replace every field present in the update. Omitted fields are untouched;
 * nothing is merged, contextualRoles included.
 */
export function applyProfileUpdate(current: StoredProfile, update: ProfileUpdate): StoredProfile {
  return {
    email: current.email,
    hierarchyLevel: update.hierarchyLevel ?? current.hierarchyLevel,
    departments: update.departments ?? current.departments,
    projects: update.projects ?? current.projects,
    contextualRoles: update.contextualRoles ?? current.contextualRoles,
  };
}

/**
 * Validate an untrusted partial update and return it in canonical form.
 * @throws ValidationError on the first malformed field; nothing is written
 */
export function parseProfileUpdate(input: unknown, vocabulary: TagVocabulary): ProfileUpdate {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    throw new ValidationError('Permission update must be an object');
  }

  const fields: Record<string, unknown> = { ...input };
  const unknownKeys = Object.keys(fields).filter(
    (key) => !UPDATE_FIELDS.has(key)
  );
  if (unknownKeys.length > 0) {
    throw new ValidationError(`Unknown permission field(s): ${unknownKeys.join(', ')}`);
  }

  const update: ProfileUpdate = {};

  if (fields.hierarchyLevel !== undefined) {
    const level = fields.hierarchyLevel;
    if (typeof level !== 'number' || !Number.isInteger(level)) {
      throw new ValidationError('hierarchyLevel must be an integer', 'hierarchyLevel');
    }
    if (level < 0 || level > vocabulary.maxRank) {
      throw new ValidationError(
        `hierarchyLevel must be between 0 and ${vocabulary.maxRank}`,
        'hierarchyLevel'
      );
    }
    update.hierarchyLevel = level;
  }

  if (fields.departments !== undefined) {
    update.departments = parseTagList(fields.departments, 'departments');
  }

  if (fields.projects !== undefined) {
    update.projects = parseTagList(fields.projects, 'projects');
  }

  if (fields.contextualRoles !== undefined) {
    const roles = fields.contextualRoles;
    if (typeof roles !== 'object' || roles === null || Array.isArray(roles)) {
      throw new ValidationError('contextualRoles must be an object', 'contextualRoles');
    }
    const parsed: ContextualRoles = Object.fromEntries(
      Object.entries(roles).map(([context, values]) => {
        if (!normalizeTag(context)) {
          throw new ValidationError(
            `contextualRoles key "${context}" has no letters or digits`,
            'contextualRoles'
          );
        }
        return [context, parseTagList(values, `contextualRoles.${context}`)];
      })
    );
    update.contextualRoles = toContextualRoles(parsed);
  }

  return update;
}

function parseTagList(value: unknown, field: string): string[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${field} must be an array of strings`, field);
  }
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new ValidationError(`${field} must be an array of strings`, field);
    }
    if (!normalizeTag(item)) {
      throw new ValidationError(`${field} contains "${item}", which has no letters or digits`, field);
    }
  }
  return toTagSet(value);
}
