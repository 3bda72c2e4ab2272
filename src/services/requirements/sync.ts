// =============================================================================
// PATHGUARD — Requirement Synchronization
//
// Re-derives every document in the corpus and reconciles the requirement
// store: new documents are added, changed requirements replaced, vanished
// documents removed. Unchanged requirements are not written, so a repeated
// run over the same corpus writes nothing. A run interrupted part way can be
// started again; it picks up wherever the store is.
// =============================================================================

import { derive } from '../../authorization/deriver';
import { PermissionRequirement, RoleRequirement } from '../../types/permissions';
import { RequirementStore } from '../../types/stores';
import { TagVocabulary } from '../../types/vocabulary';
import { DocumentSource } from './source';

export interface SyncReport {
  added: number;
  updated: number;
  removed: number;
  unchanged: number;
}

function sameRole(a: RoleRequirement | null, b: RoleRequirement | null): boolean {
  if (a === null || b === null) return a === b;
  return (
    a.role === b.role &&
    a.context.kind === b.context.kind &&
    a.context.tag === b.context.tag &&
    a.rankSubstitute === b.rankSubstitute
  );
}

/** Field-wise equality; stored JSON may not keep key order */
export function sameRequirement(a: PermissionRequirement, b: PermissionRequirement): boolean {
  return (
    a.sourcePath === b.sourcePath &&
    a.department === b.department &&
    a.project === b.project &&
    a.minHierarchyLevel === b.minHierarchyLevel &&
    sameRole(a.requiredRole, b.requiredRole)
  );
}

export async function synchronizeRequirements(
  source: DocumentSource,
  store: RequirementStore,
  vocabulary: TagVocabulary
): Promise<SyncReport> {
  const report: SyncReport = { added: 0, updated: 0, removed: 0, unchanged: 0 };
  const paths = await source.listDocuments();
  const listed = new Set(paths);

  for (const sourcePath of paths) {
    const derived = derive(sourcePath, vocabulary);
    const existing = await store.get(sourcePath);

    if (existing === null) {
      await store.put(derived);
      report.added++;
    } else if (!sameRequirement(existing, derived)) {
      await store.put(derived);
      report.updated++;
    } else {
      report.unchanged++;
    }
  }

  for (const stored of await store.list()) {
    if (!listed.has(stored.sourcePath)) {
      await store.delete(stored.sourcePath);
      report.removed++;
    }
  }

  console.log(
    `[Sync] ${paths.length} documents: ${report.added} added, ${report.updated} updated, ` +
      `${report.removed} removed, ${report.unchanged} unchanged`
  );
  return report;
}
