// =============================================================================
// PATHGUARD — PostgreSQL Requirement Store
//
// One row per document. Writes replace the whole requirement in a single
// statement, so readers see either the previous or the new requirement.
// =============================================================================

import { Pool } from 'pg';
import { PermissionRequirement } from '../../types/permissions';
import { RequirementStore } from '../../types/stores';

interface RequirementRow {
  source_path: string;
  requirement: PermissionRequirement;
}

export class PgRequirementStore implements RequirementStore {
  constructor(private readonly pool: Pool) {}

  async get(sourcePath: string): Promise<PermissionRequirement | null> {
    const result = await this.pool.query<RequirementRow>(
      `SELECT source_path, requirement FROM document_requirements WHERE source_path = $1`,
      [sourcePath]
    );
    return result.rows.length > 0 ? result.rows[0].requirement : null;
  }

  async list(): Promise<PermissionRequirement[]> {
    const result = await this.pool.query<RequirementRow>(
      `SELECT source_path, requirement FROM document_requirements ORDER BY source_path`
    );
    return result.rows.map((row) => row.requirement);
  }

  async put(requirement: PermissionRequirement): Promise<void> {
    await this.pool.query(
      `INSERT INTO document_requirements (source_path, requirement, derived_at)
       VALUES ($1, $2, now())
       ON CONFLICT (source_path) DO UPDATE SET
         requirement = EXCLUDED.requirement,
         derived_at  = EXCLUDED.derived_at`,
      [requirement.sourcePath, JSON.stringify(requirement)]
    );
  }

  async delete(sourcePath: string): Promise<boolean> {
    const result = await this.pool.query(
      `DELETE FROM document_requirements WHERE source_path = $1`,
      [sourcePath]
    );
    return (result.rowCount ?? 0) > 0;
  }
}
