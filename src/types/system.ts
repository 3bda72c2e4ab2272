// =============================================================================
// PATHGUARD — Application Wiring Types
//
// Everything the HTTP layer needs, assembled once at startup. The server
// wires PostgreSQL stores; tests wire the in-process ones.
// =============================================================================

import { DocumentSource } from '../services/requirements/source';
import {
  AuditStore,
  FeedbackStore,
  ProfileStore,
  RequirementStore,
  TicketStore,
} from './stores';
import { TagVocabulary } from './vocabulary';

export interface AppSettings {
  nodeEnv: string;
  jwtSecret: string;
  /** Token lifetime */
  jwtExpirySeconds: number;
  /** Create a default profile on first login */
  autoProvision: boolean;
  /** Login attempts per IP per 15 minutes */
  rateLimitAuthMax: number;
  ticketTeams: readonly string[];
}

export interface StoreSet {
  profiles: ProfileStore;
  requirements: RequirementStore;
  tickets: TicketStore;
  feedback: FeedbackStore;
  audit: AuditStore;
}

export interface AppDeps {
  settings: AppSettings;
  vocabulary: TagVocabulary;
  stores: StoreSet;
  /** Corpus listed by requirement syncs */
  documents: DocumentSource;
}

export interface HealthCheck {
  status: 'healthy' | 'unhealthy';
  latencyMs: number;
}
