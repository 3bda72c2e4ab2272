// =============================================================================
// PATHGUARD — Main Server
// Path-derived document access control for a retrieval assistant.
//
// Startup order: vocabulary (fatal when malformed), stores, HTTP.
// =============================================================================

import { config } from './config';
import { createApp } from './app';
import { loadVocabulary } from './vocabulary';
import { createPool } from './db/pool';
import { initSchema } from './db/schema';
import { PgProfileStore } from './db/postgres/profiles';
import { PgRequirementStore } from './db/postgres/requirements';
import { PgFeedbackStore, PgTicketStore } from './db/postgres/records';
import { PgAuditStore } from './db/postgres/audit';
import {
  MemoryAuditStore,
  MemoryFeedbackStore,
  MemoryProfileStore,
  MemoryRequirementStore,
  MemoryTicketStore,
} from './db/memory';
import { FileSystemDocumentSource } from './services/requirements';
import { errorMessage } from './types/errors';
import { StoreSet } from './types/system';

async function createStores(): Promise<StoreSet> {
  if (config.db.driver === 'memory') {
    console.warn('[Server] STORE_DRIVER=memory: profiles are lost on restart');
    return {
      profiles: new MemoryProfileStore(),
      requirements: new MemoryRequirementStore(),
      tickets: new MemoryTicketStore(),
      feedback: new MemoryFeedbackStore(),
      audit: new MemoryAuditStore(),
    };
  }

  const pool = createPool(config.db.connectionString);
  await initSchema(pool);
  return {
    profiles: new PgProfileStore(pool),
    requirements: new PgRequirementStore(pool),
    tickets: new PgTicketStore(pool),
    feedback: new PgFeedbackStore(pool),
    audit: new PgAuditStore(pool),
  };
}

async function main(): Promise<void> {
  const vocabulary = loadVocabulary(config.vocabularyPath);
  console.log(
    `[Server] Vocabulary loaded: ${vocabulary.departments.size} departments, ` +
      `ranks 0-${vocabulary.maxRank}, ${vocabulary.roleFolders.size} role folders`
  );

  const stores = await createStores();
  const app = createApp({
    settings: {
      nodeEnv: config.nodeEnv,
      jwtSecret: config.jwt.secret,
      jwtExpirySeconds: config.jwt.expirySeconds,
      autoProvision: config.auth.autoProvision,
      rateLimitAuthMax: config.auth.rateLimitMax,
      ticketTeams: config.ticketTeams,
    },
    vocabulary,
    stores,
    documents: new FileSystemDocumentSource(config.docsFolder),
  });

  app.listen(config.port, () => {
    console.log(`
╔══════════════════════════════════════════════════════════════╗
║  PATHGUARD — Path-Derived Document Access Control            ║
║                                                              ║
║  Port:     ${String(config.port).padEnd(50)}║
║  Env:      ${config.nodeEnv.padEnd(50)}║
║  Stores:   ${config.db.driver.padEnd(50)}║
║  Docs:     ${config.docsFolder.slice(-50).padEnd(50)}║
║                                                              ║
║    /api/auth/*       → Login, current profile                ║
║    /api/documents/*  → Visibility filtering                  ║
║    /api/admin/*      → Permission administration             ║
║    /api/health       → Unauthenticated health check          ║
╚══════════════════════════════════════════════════════════════╝
  `);
  });
}

main().catch((err: unknown) => {
  console.error('[Server] Startup failed:', errorMessage(err));
  process.exit(1);
});
