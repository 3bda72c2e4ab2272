// =============================================================================
// PATHGUARD — Permission Types
//
// PermissionRequirement is derived from a document path.
// UserProfile is read from the profile store.
// The access evaluator compares the two.
// =============================================================================

/** Where a required role must be held */
export type RoleContextKind = 'department' | 'project' | 'general';

export interface RoleContext {
  kind: RoleContextKind;
  /** Department or project tag; the default department tag for 'general' */
  tag: string;
}

export interface RoleRequirement {
  role: string;
  context: RoleContext;
  /** Rank that satisfies the role without an explicit grant, or null */
  rankSubstitute: number | null;
}

/**
 * Access requirement for one document.
 * A pure function of `sourcePath` and the tag vocabulary.
 */
export interface PermissionRequirement {
  sourcePath: string;
  department: string | null;
  project: string | null;
  minHierarchyLevel: number;
  requiredRole: RoleRequirement | null;
}

export type ContextualRoles = Record<string, string[]>;

export interface UserProfile {
  /** Trimmed, lower-cased */
  email: string;
  hierarchyLevel: number;
  /** Sorted, de-duplicated, normalized */
  departments: string[];
  projects: string[];
  contextualRoles: ContextualRoles;
  /** hierarchyLevel equals the vocabulary's admin rank */
  isAdmin: boolean;
}

/** Stored form of a profile; isAdmin is always recomputed */
export type StoredProfile = Omit<UserProfile, 'isAdmin'>;

/**
 * Partial update for a profile. Each present field replaces the stored
 * field wholesale; contextualRoles replaces the whole mapping.
 */
export interface ProfileUpdate {
  hierarchyLevel?: number;
  departments?: string[];
  projects?: string[];
  contextualRoles?: ContextualRoles;
}

/** Which clause granted access */
export type AccessGrant = 'admin' | 'department' | 'project' | 'general';

export interface AccessDecision {
  allowed: boolean;
  grantedBy: AccessGrant | null;
}
