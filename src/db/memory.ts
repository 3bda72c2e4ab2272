// =============================================================================
// PATHGUARD — In-Process Stores
//
// Map-backed implementations of the store interfaces, for tests and for
// running the service without PostgreSQL (STORE_DRIVER=memory). Values are
// copied in and out so callers never share references with the store.
// =============================================================================

import { v4 as uuidv4 } from 'uuid';
import { KeyedLock } from '../utils/keyed-lock';
import { PermissionRequirement, StoredProfile } from '../types/permissions';
import {
  AuditQuery,
  AuditRecord,
  AuditStore,
  Feedback,
  FeedbackStore,
  NewFeedback,
  NewTicket,
  ProfileStore,
  ProfileWrite,
  RequirementStore,
  Ticket,
  TicketStore,
} from '../types/stores';

export class MemoryProfileStore implements ProfileStore {
  private readonly profiles = new Map<string, StoredProfile>();
  private readonly lock = new KeyedLock();

  async get(email: string): Promise<StoredProfile | null> {
    const profile = this.profiles.get(email);
    return profile ? structuredClone(profile) : null;
  }

  async list(): Promise<StoredProfile[]> {
    return [...this.profiles.values()]
      .sort((a, b) => compareKeys(a.email, b.email))
      .map((profile) => structuredClone(profile));
  }

  modify(
    email: string,
    mutate: (current: StoredProfile | null) => StoredProfile
  ): Promise<ProfileWrite> {
    return this.lock.run(email, () => {
      const current = this.profiles.get(email);
      const next = mutate(current ? structuredClone(current) : null);
      this.profiles.set(email, structuredClone({ ...next, email }));
      return { profile: structuredClone({ ...next, email }), created: current === undefined };
    });
  }

  async remove(email: string): Promise<boolean> {
    return this.lock.run(email, () => this.profiles.delete(email));
  }

  async isAvailable(): Promise<boolean> {
    return true;
  }
}

export class MemoryRequirementStore implements RequirementStore {
  private readonly requirements = new Map<string, PermissionRequirement>();
  /** Number of put() calls, for observing idempotent syncs */
  writes = 0;

  async get(sourcePath: string): Promise<PermissionRequirement | null> {
    const requirement = this.requirements.get(sourcePath);
    return requirement ? structuredClone(requirement) : null;
  }

  async list(): Promise<PermissionRequirement[]> {
    return [...this.requirements.values()]
      .sort((a, b) => compareKeys(a.sourcePath, b.sourcePath))
      .map((requirement) => structuredClone(requirement));
  }

  async put(requirement: PermissionRequirement): Promise<void> {
    this.writes++;
    this.requirements.set(requirement.sourcePath, structuredClone(requirement));
  }

  async delete(sourcePath: string): Promise<boolean> {
    return this.requirements.delete(sourcePath);
  }
}

export class MemoryTicketStore implements TicketStore {
  readonly recordType = 'ticket';
  private tickets: Ticket[] = [];

  async create(ticket: NewTicket): Promise<Ticket> {
    const created: Ticket = { ...ticket, id: uuidv4(), status: 'open', createdAt: new Date() };
    this.tickets.push(created);
    return { ...created };
  }

  async listRecent(limit: number): Promise<Ticket[]> {
    return [...this.tickets].reverse().slice(0, limit).map((ticket) => ({ ...ticket }));
  }

  async deleteOwnedBy(email: string): Promise<number> {
    const before = this.tickets.length;
    this.tickets = this.tickets.filter((ticket) => ticket.userEmail !== email);
    return before - this.tickets.length;
  }
}

export class MemoryFeedbackStore implements FeedbackStore {
  readonly recordType = 'feedback';
  private entries: Feedback[] = [];

  async create(feedback: NewFeedback): Promise<Feedback> {
    const created: Feedback = { ...feedback, id: uuidv4(), createdAt: new Date() };
    this.entries.push(created);
    return { ...created };
  }

  async deleteOwnedBy(email: string): Promise<number> {
    const before = this.entries.length;
    this.entries = this.entries.filter((entry) => entry.userEmail !== email);
    return before - this.entries.length;
  }

  /** Entries for one user, oldest first */
  async listFor(email: string): Promise<Feedback[]> {
    return this.entries.filter((entry) => entry.userEmail === email).map((entry) => ({ ...entry }));
  }
}

export class MemoryAuditStore implements AuditStore {
  private readonly records: AuditRecord[] = [];

  async append(record: AuditRecord): Promise<void> {
    this.records.push(structuredClone(record));
  }

  async query(filters: AuditQuery): Promise<AuditRecord[]> {
    const offset = filters.offset ?? 0;
    const limit = filters.limit ?? this.records.length;
    return [...this.records]
      .reverse()
      .filter(
        (record) =>
          (!filters.category || record.category === filters.category) &&
          (!filters.eventType || record.eventType === filters.eventType) &&
          (!filters.actorEmail || record.actorEmail === filters.actorEmail) &&
          (!filters.targetId || record.targetId === filters.targetId)
      )
      .slice(offset, offset + limit)
      .map((record) => structuredClone(record));
  }
}

function compareKeys(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}
