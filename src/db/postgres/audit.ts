// =============================================================================
// PATHGUARD — PostgreSQL Audit Store
// Append-only: the application never updates or deletes audit rows.
// =============================================================================

import { Pool } from 'pg';
import { AuditCategory, AuditQuery, AuditRecord, AuditStore } from '../../types/stores';

interface AuditRow {
  id: string;
  event_time: Date;
  category: AuditCategory;
  event_type: string;
  description: string;
  actor_email: string | null;
  target_type: string | null;
  target_id: string | null;
  metadata: Record<string, unknown>;
  event_hash: string;
}

export class PgAuditStore implements AuditStore {
  constructor(private readonly pool: Pool) {}

  async append(record: AuditRecord): Promise<void> {
    await this.pool.query(
      `INSERT INTO audit_trail
         (id, event_time, category, event_type, description,
          actor_email, target_type, target_id, metadata, event_hash)
       VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)`,
      [
        record.id,
        record.eventTime,
        record.category,
        record.eventType,
        record.description,
        record.actorEmail,
        record.targetType,
        record.targetId,
        JSON.stringify(record.metadata),
        record.eventHash,
      ]
    );
  }

  async query(filters: AuditQuery): Promise<AuditRecord[]> {
    const conditions: string[] = [];
    const params: Array<string | number> = [];

    if (filters.category) {
      params.push(filters.category);
      conditions.push(`category = $${params.length}`);
    }
    if (filters.eventType) {
      params.push(filters.eventType);
      conditions.push(`event_type = $${params.length}`);
    }
    if (filters.actorEmail) {
      params.push(filters.actorEmail);
      conditions.push(`actor_email = $${params.length}`);
    }
    if (filters.targetId) {
      params.push(filters.targetId);
      conditions.push(`target_id = $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    params.push(filters.limit ?? 50, filters.offset ?? 0);

    const result = await this.pool.query<AuditRow>(
      `SELECT id, event_time, category, event_type, description,
              actor_email, target_type, target_id, metadata, event_hash
       FROM audit_trail
       ${where}
       ORDER BY event_time DESC
       LIMIT $${params.length - 1} OFFSET $${params.length}`,
      params
    );

    return result.rows.map((row) => ({
      id: row.id,
      eventTime: row.event_time,
      category: row.category,
      eventType: row.event_type,
      description: row.description,
      actorEmail: row.actor_email,
      targetType: row.target_type,
      targetId: row.target_id,
      metadata: row.metadata,
      eventHash: row.event_hash,
    }));
  }
}
