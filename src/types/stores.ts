// =============================================================================
// PATHGUARD — Store Interfaces
//
// Persistence is reached only through these interfaces. PostgreSQL
// implementations live in src/db/postgres; in-process implementations in
// src/db/memory serve tests and local development.
// =============================================================================

import { PermissionRequirement, StoredProfile } from './permissions';

export interface ProfileWrite {
  profile: StoredProfile;
  /** The profile did not exist before this write */
  created: boolean;
}

export interface ProfileStore {
  get(email: string): Promise<StoredProfile | null>;

  /** All profiles, ordered by email */
  list(): Promise<StoredProfile[]>;

  /**
   * Atomic read-modify-write of one profile. `mutate` receives the current
   * profile (null when absent) and returns the profile to store. Calls for
   * the same email are serialized; calls for different emails are not.
   */
  modify(
    email: string,
    mutate: (current: StoredProfile | null) => StoredProfile
  ): Promise<ProfileWrite>;

  /** Returns false when no profile existed */
  remove(email: string): Promise<boolean>;

  isAvailable(): Promise<boolean>;
}

/** Derived requirement cache, one record per document path */
export interface RequirementStore {
  get(sourcePath: string): Promise<PermissionRequirement | null>;
  list(): Promise<PermissionRequirement[]>;
  /** Replaces the whole record for the document */
  put(requirement: PermissionRequirement): Promise<void>;
  delete(sourcePath: string): Promise<boolean>;
}

/** Records owned by a user identity, deleted when the user is removed */
export interface OwnedRecordCascade {
  readonly recordType: string;
  /** Returns how many records were deleted */
  deleteOwnedBy(email: string): Promise<number>;
}

// ── Tickets ────────────────────────────────────────────────────────────

export type TicketStatus = 'open' | 'closed';

export interface NewTicket {
  userEmail: string;
  question: string;
  chatHistory: string;
  team: string;
}

export interface Ticket extends NewTicket {
  id: string;
  status: TicketStatus;
  createdAt: Date;
}

export interface TicketStore extends OwnedRecordCascade {
  create(ticket: NewTicket): Promise<Ticket>;
  /** Newest first */
  listRecent(limit: number): Promise<Ticket[]>;
}

// ── Feedback ───────────────────────────────────────────────────────────

export type FeedbackRating = 'helpful' | 'not_helpful';

export interface NewFeedback {
  userEmail: string;
  question: string;
  answer: string;
  rating: FeedbackRating;
}

export interface Feedback extends NewFeedback {
  id: string;
  createdAt: Date;
}

export interface FeedbackStore extends OwnedRecordCascade {
  create(feedback: NewFeedback): Promise<Feedback>;
}

// ── Audit ──────────────────────────────────────────────────────────────

export type AuditCategory = 'administration' | 'authentication' | 'synchronization';

export interface AuditEvent {
  category: AuditCategory;
  eventType: string;
  description: string;
  actorEmail?: string;
  targetType?: string;
  targetId?: string;
  metadata?: Record<string, unknown>;
}

export interface AuditRecord {
  id: string;
  eventTime: Date;
  category: AuditCategory;
  eventType: string;
  description: string;
  actorEmail: string | null;
  targetType: string | null;
  targetId: string | null;
  metadata: Record<string, unknown>;
  /** SHA-512 over the event fields */
  eventHash: string;
}

export interface AuditQuery {
  category?: AuditCategory;
  eventType?: string;
  actorEmail?: string;
  targetId?: string;
  limit?: number;
  offset?: number;
}

export interface AuditStore {
  append(record: AuditRecord): Promise<void>;
  /** Newest first */
  query(filters: AuditQuery): Promise<AuditRecord[]>;
}
