// =============================================================================
// PATHGUARD — Path Metadata Deriver
//
// Turns a document's storage path into its PermissionRequirement.
//
// Directory segments are folded left to right through an ordered list of
// matcher rules. The first rule that recognizes a segment consumes it and
// overwrites its dimension, so the deepest match wins for every dimension.
// Unrecognized segments are skipped: they never widen or narrow access.
//
// The deriver is pure. It reads nothing but the path and the vocabulary it
// is given, and never throws.
// =============================================================================

import {
  isProjectRoot,
  lookupDepartment,
  lookupHierarchyToken,
  lookupRoleFolder,
  normalizeTag,
} from '../vocabulary';
import { PermissionRequirement, RoleContext, RoleRequirement } from '../types/permissions';
import { TagVocabulary } from '../types/vocabulary';

interface DerivationState {
  department: string | null;
  project: string | null;
  minHierarchyLevel: number | null;
  requiredRole: RoleRequirement | null;
  /** Nearest department or project segment seen so far */
  context: RoleContext | null;
  /** The previous segment was a project root */
  expectProject: boolean;
}

interface MatchContext {
  vocabulary: TagVocabulary;
  afterProjectRoot: boolean;
}

/** A matcher returns the next state when it recognizes the segment, else null */
type MatcherRule = (
  segment: string,
  state: DerivationState,
  ctx: MatchContext
) => DerivationState | null;

// "<TOKEN>_<DIGIT>" with an optional "_<anything>" tail, e.g. MANAGER_2_Budget
const RANK_OVERRIDE_PATTERN = /^(.+?)_(\d)(?:_.*)?$/;

const projectMember: MatcherRule = (segment, state, { afterProjectRoot }) => {
  if (!afterProjectRoot) return null;
  const tag = normalizeTag(segment);
  if (!tag) return null;
  return { ...state, project: tag, context: { kind: 'project', tag } };
};

const projectRoot: MatcherRule = (segment, state, { vocabulary }) =>
  isProjectRoot(vocabulary, segment) ? { ...state, expectProject: true } : null;

const department: MatcherRule = (segment, state, { vocabulary }) => {
  const tag = lookupDepartment(vocabulary, segment);
  if (!tag) return null;
  return { ...state, department: tag, context: { kind: 'department', tag } };
};

const hierarchyLevel: MatcherRule = (segment, state, { vocabulary }) => {
  const rank = lookupHierarchyToken(vocabulary, segment);
  if (rank !== null) {
    return { ...state, minHierarchyLevel: rank };
  }

  const canonical = segment.trim().toUpperCase().replace(/[\s.-]+/g, '_');
  const match = RANK_OVERRIDE_PATTERN.exec(canonical);
  if (!match || lookupHierarchyToken(vocabulary, match[1]) === null) return null;

  const override = Number(match[2]);
  if (override > vocabulary.maxRank) return null;
  return { ...state, minHierarchyLevel: override };
};

const roleFolder: MatcherRule = (segment, state, { vocabulary }) => {
  const definition = lookupRoleFolder(vocabulary, segment);
  if (!definition) return null;
  return {
    ...state,
    requiredRole: {
      role: definition.role,
      context: state.context ?? { kind: 'general', tag: vocabulary.defaultDepartment },
      rankSubstitute: definition.rankSubstitute,
    },
  };
};

/** Tried in order; the first match consumes the segment */
export const MATCHER_RULES: readonly MatcherRule[] = [
  projectMember,
  projectRoot,
  department,
  hierarchyLevel,
  roleFolder,
];

/**
 * Split a storage path into directory segments.
 * Both separators are accepted. The last segment is the filename and is
 * dropped unless the path ends with a separator.
 */
export function splitDocumentPath(path: string): string[] {
  const endsWithSeparator = /[\\/]\s*$/.test(path);
  const segments = path
    .split(/[\\/]+/)
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);

  if (!endsWithSeparator) {
    segments.pop();
  }
  return segments;
}

/**
 * Derive the permission requirement of a document.
 *
 * A string is a storage path (filename included unless it ends with a
 * separator); an array is taken as the directory segments, root first.
 */
export function derive(
  path: string | readonly string[],
  vocabulary: TagVocabulary
): PermissionRequirement {
  const sourcePath = typeof path === 'string' ? path : path.join('/');
  const segments = typeof path === 'string' ? splitDocumentPath(path) : path;

  let state: DerivationState = {
    department: null,
    project: null,
    minHierarchyLevel: null,
    requiredRole: null,
    context: null,
    expectProject: false,
  };

  for (const segment of segments) {
    const ctx: MatchContext = { vocabulary, afterProjectRoot: state.expectProject };
    const base: DerivationState = { ...state, expectProject: false };

    state = base;
    for (const rule of MATCHER_RULES) {
      const next = rule(segment, base, ctx);
      if (next) {
        state = next;
        break;
      }
    }
  }

  return {
    sourcePath,
    department: state.department,
    project: state.project,
    minHierarchyLevel: state.minHierarchyLevel ?? vocabulary.defaultHierarchyLevel,
    requiredRole: state.requiredRole,
  };
}
