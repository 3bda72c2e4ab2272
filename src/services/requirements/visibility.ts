// =============================================================================
// PATHGUARD — Visibility Filter
//
// Narrows candidate documents (e.g. search hits) to those the user may see.
// Denied documents are dropped without a trace; the caller cannot tell a
// denied document from one that does not exist.
// =============================================================================

import { derive } from '../../authorization/deriver';
import { canAccess } from '../../authorization/evaluator';
import { UserProfile } from '../../types/permissions';
import { RequirementStore } from '../../types/stores';
import { TagVocabulary } from '../../types/vocabulary';

/**
 * Candidate paths the user may see, in their original order. Paths with no
 * stored requirement are derived on the fly.
 */
export async function filterVisible(
  user: UserProfile,
  paths: readonly string[],
  store: RequirementStore,
  vocabulary: TagVocabulary
): Promise<string[]> {
  const visible: string[] = [];
  for (const sourcePath of paths) {
    const requirement = (await store.get(sourcePath)) ?? derive(sourcePath, vocabulary);
    if (canAccess(user, requirement)) {
      visible.push(sourcePath);
    }
  }
  return visible;
}
