// =============================================================================
// PATHGUARD — Audit Service
//
// Append-only trail of permission changes, logins and corpus syncs.
// Individual access checks are not audited: a denied document simply does
// not appear, and logging denials per document would reveal its existence.
// =============================================================================

import { createHash } from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { AuditEvent, AuditQuery, AuditRecord, AuditStore } from '../types/stores';

const DEFAULT_LIMIT = 50;
const MAX_LIMIT = 500;

/**
 * Build the stored record for an event: a fresh ID, the current time, and a
 * SHA-512 hash over the event fields for integrity checks.
 */
export function buildAuditRecord(event: AuditEvent, now: Date = new Date()): AuditRecord {
  const id = uuidv4();
  const metadata = event.metadata || {};

  const hashInput = JSON.stringify({
    id,
    timestamp: now.toISOString(),
    category: event.category,
    eventType: event.eventType,
    description: event.description,
    actorEmail: event.actorEmail,
    targetType: event.targetType,
    targetId: event.targetId,
    metadata,
  });

  return {
    id,
    eventTime: now,
    category: event.category,
    eventType: event.eventType,
    description: event.description,
    actorEmail: event.actorEmail || null,
    targetType: event.targetType || null,
    targetId: event.targetId || null,
    metadata,
    eventHash: createHash('sha512').update(hashInput).digest('hex'),
  };
}

export class AuditService {
  constructor(private readonly store: AuditStore) {}

  async record(event: AuditEvent): Promise<{ eventId: string; eventHash: string }> {
    const record = buildAuditRecord(event);
    await this.store.append(record);
    return { eventId: record.id, eventHash: record.eventHash };
  }

  async query(filters: AuditQuery): Promise<AuditRecord[]> {
    const limit = Math.min(Math.max(filters.limit ?? DEFAULT_LIMIT, 1), MAX_LIMIT);
    const offset = Math.max(filters.offset ?? 0, 0);
    return this.store.query({ ...filters, limit, offset });
  }
}
