// =============================================================================
// PATHGUARD — Test Helpers
//
// Starts the Express app in-process on an ephemeral port, wired to the
// in-process stores, and offers a small fetch-based client. Tokens are
// signed with a placeholder secret.
// =============================================================================

import path from 'path';
import { Server } from 'http';
import jwt from 'jsonwebtoken';
import { createApp } from '../src/app';
import { loadVocabulary } from '../src/vocabulary';
import {
  MemoryAuditStore,
  MemoryFeedbackStore,
  MemoryProfileStore,
  MemoryRequirementStore,
  MemoryTicketStore,
} from '../src/db/memory';
import { DocumentSource, StaticDocumentSource } from '../src/services/requirements';
import { StoredProfile, UserProfile } from '../src/types/permissions';
import { AppSettings } from '../src/types/system';
import { toUserProfile } from '../src/authorization/profile';

export const TEST_SECRET = 'test-secret';

export const vocabulary = loadVocabulary(path.join(__dirname, '..', 'config', 'vocabulary.json'));

export interface MemoryStores {
  profiles: MemoryProfileStore;
  requirements: MemoryRequirementStore;
  tickets: MemoryTicketStore;
  feedback: MemoryFeedbackStore;
  audit: MemoryAuditStore;
}

export function createMemoryStores(): MemoryStores {
  return {
    profiles: new MemoryProfileStore(),
    requirements: new MemoryRequirementStore(),
    tickets: new MemoryTicketStore(),
    feedback: new MemoryFeedbackStore(),
    audit: new MemoryAuditStore(),
  };
}

export function testSettings(overrides: Partial<AppSettings> = {}): AppSettings {
  return {
    nodeEnv: 'test',
    jwtSecret: TEST_SECRET,
    jwtExpirySeconds: 600,
    autoProvision: false,
    rateLimitAuthMax: 1000,
    ticketTeams: ['Helpdesk', 'HR', 'IT', 'Legal', 'General'],
    ...overrides,
  };
}

/** Seed profiles used across the HTTP suites */
export const PROFILES = {
  admin: {
    email: 'admin@example.com',
    hierarchyLevel: 3,
    departments: [],
    projects: [],
    contextualRoles: {},
  },
  hrManager: {
    email: 'hr.manager@example.com',
    hierarchyLevel: 1,
    departments: ['HR'],
    projects: [],
    contextualRoles: {},
  },
  hrStaff: {
    email: 'hr.staff@example.com',
    hierarchyLevel: 0,
    departments: ['HR'],
    projects: [],
    contextualRoles: {},
  },
  alphaMember: {
    email: 'alpha@example.com',
    hierarchyLevel: 0,
    departments: ['IT'],
    projects: ['ALPHA'],
    contextualRoles: {},
  },
} satisfies Record<string, StoredProfile>;

export type SeedUser = keyof typeof PROFILES;

export function userProfile(user: SeedUser): UserProfile {
  return toUserProfile(PROFILES[user], vocabulary);
}

export interface TestServer {
  baseUrl: string;
  stores: MemoryStores;
  close(): Promise<void>;
}

export interface StartOptions {
  settings?: Partial<AppSettings>;
  documents?: DocumentSource;
  stores?: MemoryStores;
  /** Seed users to store before the server starts (default: all) */
  seed?: readonly SeedUser[];
}

export async function startServer(options: StartOptions = {}): Promise<TestServer> {
  const stores = options.stores ?? createMemoryStores();
  const seed = options.seed ?? Object.keys(PROFILES).filter(isSeedUser);
  for (const user of seed) {
    await stores.profiles.modify(PROFILES[user].email, () => structuredClone(PROFILES[user]));
  }

  const app = createApp({
    settings: testSettings(options.settings),
    vocabulary,
    stores,
    documents: options.documents ?? new StaticDocumentSource([]),
  });

  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, () => resolve(listening));
  });
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Test server has no TCP address');
  }

  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    stores,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      }),
  };
}

function isSeedUser(key: string): key is SeedUser {
  return key in PROFILES;
}

/** Signed token for an email, as the login route would issue */
export function tokenFor(email: string, secret: string = TEST_SECRET): string {
  return jwt.sign({ sub: email }, secret, { expiresIn: 600 });
}

/**
 * Make an API request against a test server.
 * Returns the raw Response object for flexible assertion.
 */
export async function api(
  server: TestServer,
  method: string,
  urlPath: string,
  body?: unknown,
  token?: string,
): Promise<Response> {
  const headers: Record<string, string> = {};

  if (token) {
    headers['Authorization'] = `Bearer ${token}`;
  }
  if (body !== undefined) {
    headers['Content-Type'] = 'application/json';
  }

  return fetch(`${server.baseUrl}${urlPath}`, {
    method,
    headers,
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

/** Authenticated request as one of the seed users */
export async function authApi(
  server: TestServer,
  user: SeedUser,
  method: string,
  urlPath: string,
  body?: unknown,
): Promise<Response> {
  return api(server, method, urlPath, body, tokenFor(PROFILES[user].email));
}

/**
 * Parse JSON response with error context.
 */
export async function json<T>(res: Response): Promise<T> {
  const text = await res.text();
  try {
    return JSON.parse(text);
  } catch {
    throw new Error(`Expected JSON but got: ${text.slice(0, 200)}`);
  }
}

export interface ErrorBody {
  error: string;
  code: string;
}
