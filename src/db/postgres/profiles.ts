// =============================================================================
// PATHGUARD — PostgreSQL Profile Store
//
// Each modify() runs in one transaction holding a transaction-scoped
// advisory lock on the email, so two upserts of the same user never
// interleave, including when the row does not exist yet. Different users
// take different locks and proceed in parallel.
// =============================================================================

import { Pool } from 'pg';
import { StoredProfile } from '../../types/permissions';
import { ProfileStore, ProfileWrite } from '../../types/stores';

interface ProfileRow {
  email: string;
  hierarchy_level: number;
  departments: string[];
  projects: string[];
  contextual_roles: Record<string, string[]>;
}

const COLUMNS = 'email, hierarchy_level, departments, projects, contextual_roles';

function toProfile(row: ProfileRow): StoredProfile {
  return {
    email: row.email,
    hierarchyLevel: row.hierarchy_level,
    departments: row.departments,
    projects: row.projects,
    contextualRoles: row.contextual_roles,
  };
}

export class PgProfileStore implements ProfileStore {
  constructor(private readonly pool: Pool) {}

  async get(email: string): Promise<StoredProfile | null> {
    const result = await this.pool.query<ProfileRow>(
      `SELECT ${COLUMNS} FROM user_access_profiles WHERE email = $1`,
      [email]
    );
    return result.rows.length > 0 ? toProfile(result.rows[0]) : null;
  }

  async list(): Promise<StoredProfile[]> {
    const result = await this.pool.query<ProfileRow>(
      `SELECT ${COLUMNS} FROM user_access_profiles ORDER BY email`
    );
    return result.rows.map(toProfile);
  }

  async modify(
    email: string,
    mutate: (current: StoredProfile | null) => StoredProfile
  ): Promise<ProfileWrite> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query('SELECT pg_advisory_xact_lock(hashtext($1))', [email]);

      const existing = await client.query<ProfileRow>(
        `SELECT ${COLUMNS} FROM user_access_profiles WHERE email = $1 FOR UPDATE`,
        [email]
      );
      const current = existing.rows.length > 0 ? toProfile(existing.rows[0]) : null;
      const next = { ...mutate(current), email };

      await client.query(
        `INSERT INTO user_access_profiles
           (email, hierarchy_level, departments, projects, contextual_roles)
         VALUES ($1, $2, $3, $4, $5)
         ON CONFLICT (email) DO UPDATE SET
           hierarchy_level  = EXCLUDED.hierarchy_level,
           departments      = EXCLUDED.departments,
           projects         = EXCLUDED.projects,
           contextual_roles = EXCLUDED.contextual_roles,
           updated_at       = now()`,
        [
          next.email,
          next.hierarchyLevel,
          JSON.stringify(next.departments),
          JSON.stringify(next.projects),
          JSON.stringify(next.contextualRoles),
        ]
      );

      await client.query('COMMIT');
      return { profile: next, created: current === null };
    } catch (err) {
      await client.query('ROLLBACK');
      throw err;
    } finally {
      client.release();
    }
  }

  async remove(email: string): Promise<boolean> {
    const result = await this.pool.query(
      `DELETE FROM user_access_profiles WHERE email = $1`,
      [email]
    );
    return (result.rowCount ?? 0) > 0;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch (err) {
      console.warn('[DB] Availability check failed:', err instanceof Error ? err.message : err);
      return false;
    }
  }
}
