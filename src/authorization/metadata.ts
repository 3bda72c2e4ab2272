// =============================================================================
// PATHGUARD — Search Metadata Codec
//
// The ingestion pipeline stores a requirement beside each chunk of a
// document in the search index, as flat scalar metadata. Every record
// carries every key: an absent department or project is written as "", and
// an absent role as the vocabulary's default role tag with an empty context.
// A folder whose tag equals the default department (Projects/General) stays
// a real project.
// =============================================================================

import { PermissionRequirement, RoleContextKind } from '../types/permissions';
import { TagVocabulary } from '../types/vocabulary';

export interface SearchMetadata {
  source: string;
  /** "" when the document has no department */
  department_tag: string;
  /** "" when the document has no project */
  project_tag: string;
  hierarchy_level_required: number;
  role_tag_required: string;
  /** "<kind>:<tag>" of the required role, or "" when no role is required */
  role_context: string;
  /** -1 when rank cannot substitute for the role */
  role_rank_substitute: number;
}

const NO_TAG = '';

const ROLE_CONTEXT_KINDS: readonly RoleContextKind[] = ['department', 'project', 'general'];

export function toSearchMetadata(
  requirement: PermissionRequirement,
  vocabulary: TagVocabulary
): SearchMetadata {
  const role = requirement.requiredRole;
  return {
    source: requirement.sourcePath,
    department_tag: requirement.department ?? NO_TAG,
    project_tag: requirement.project ?? NO_TAG,
    hierarchy_level_required: requirement.minHierarchyLevel,
    role_tag_required: role ? role.role : vocabulary.defaultRole,
    role_context: role ? `${role.context.kind}:${role.context.tag}` : '',
    role_rank_substitute: role?.rankSubstitute ?? -1,
  };
}

/** Inverse of toSearchMetadata */
export function fromSearchMetadata(metadata: SearchMetadata): PermissionRequirement {
  const [kind, tag] = metadata.role_context.split(':');
  const contextKind = ROLE_CONTEXT_KINDS.find((candidate) => candidate === kind);

  return {
    sourcePath: metadata.source,
    department: metadata.department_tag === NO_TAG ? null : metadata.department_tag,
    project: metadata.project_tag === NO_TAG ? null : metadata.project_tag,
    minHierarchyLevel: metadata.hierarchy_level_required,
    requiredRole:
      contextKind && tag
        ? {
            role: metadata.role_tag_required,
            context: { kind: contextKind, tag },
            rankSubstitute:
              metadata.role_rank_substitute < 0 ? null : metadata.role_rank_substitute,
          }
        : null,
  };
}
