// =============================================================================
// PATHGUARD — Access Evaluator
//
// Decides whether a user may see a document, given the document's derived
// PermissionRequirement and the user's profile.
//
// Grant paths are independent and OR'd:
//   admin       — top-rank users see everything
//   department  — member of the department, rank >= minimum, role satisfied
//   project     — member of the project, role satisfied (no rank gate)
//   general     — no department and no project, rank >= minimum, role satisfied
//
// A department document is never granted through the general path.
// The evaluator never throws; anything that satisfies no clause is denied.
// =============================================================================

import {
  AccessDecision,
  PermissionRequirement,
  RoleRequirement,
  UserProfile,
} from '../types/permissions';

const DENIED: AccessDecision = { allowed: false, grantedBy: null };

/**
 * The admin-override clause on its own. Also used to authorize the
 * permission administration operations.
 */
export function hasAdminOverride(user: UserProfile): boolean {
  return user.isAdmin;
}

/**
 * A role requirement is met by an explicit grant in the role's context, or
 * by rank when the role definition allows rank to substitute for it.
 */
export function satisfiesRole(user: UserProfile, requirement: RoleRequirement): boolean {
  const granted = user.contextualRoles[requirement.context.tag] ?? [];
  if (granted.includes(requirement.role)) return true;

  return (
    requirement.rankSubstitute !== null &&
    user.hierarchyLevel >= requirement.rankSubstitute
  );
}

/** Evaluate all clauses and report which one granted access */
export function evaluateAccess(
  user: UserProfile,
  requirement: PermissionRequirement
): AccessDecision {
  if (hasAdminOverride(user)) {
    return { allowed: true, grantedBy: 'admin' };
  }

  const role = requirement.requiredRole;

  if (
    requirement.department !== null &&
    user.departments.includes(requirement.department) &&
    user.hierarchyLevel >= requirement.minHierarchyLevel &&
    (role === null || role.context.kind === 'project' || satisfiesRole(user, role))
  ) {
    return { allowed: true, grantedBy: 'department' };
  }

  if (
    requirement.project !== null &&
    user.projects.includes(requirement.project) &&
    (role === null || role.context.kind === 'department' || satisfiesRole(user, role))
  ) {
    return { allowed: true, grantedBy: 'project' };
  }

  if (
    requirement.department === null &&
    requirement.project === null &&
    user.hierarchyLevel >= requirement.minHierarchyLevel &&
    (role === null || satisfiesRole(user, role))
  ) {
    return { allowed: true, grantedBy: 'general' };
  }

  return DENIED;
}

export function canAccess(user: UserProfile, requirement: PermissionRequirement): boolean {
  return evaluateAccess(user, requirement).allowed;
}
