// =============================================================================
// PATHGUARD — Administration Routes
//
// All routes under /api/admin/ require authentication and the admin
// override. The AdminService re-checks the caller on every operation.
//
//   GET    /api/admin/users                 — list profiles
//   GET    /api/admin/users/:email          — view one profile
//   POST   /api/admin/users/provision       — default profiles for many emails
//   PATCH  /api/admin/users/:email          — create or partially update
//   DELETE /api/admin/users/:email          — remove user and owned records
//   POST   /api/admin/requirements/derive   — preview derivation for paths
//   POST   /api/admin/requirements/sync     — reconcile the requirement store
//   GET    /api/admin/tickets               — recent tickets
//   GET    /api/admin/audit                 — audit trail
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { authenticate, currentUser, requireAdmin } from '../../middleware/authenticate';
import { derive } from '../../authorization/deriver';
import { toSearchMetadata } from '../../authorization/metadata';
import { synchronizeRequirements } from '../../services/requirements';
import { ValidationError } from '../../types/errors';
import { AuditCategory, AuditQuery } from '../../types/stores';
import { AppServices } from '../../services';

const AUDIT_CATEGORIES: readonly AuditCategory[] = ['administration', 'authentication', 'synchronization'];

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function queryInteger(req: Request, name: string): number | undefined {
  const value = queryString(req, name);
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`${name} must be a non-negative integer`, name);
  }
  return Number(value);
}

function parseAuditQuery(req: Request): AuditQuery {
  const category = queryString(req, 'category');
  const knownCategory = AUDIT_CATEGORIES.find((candidate) => candidate === category);
  if (category !== undefined && !knownCategory) {
    throw new ValidationError(`category must be one of: ${AUDIT_CATEGORIES.join(', ')}`, 'category');
  }

  return {
    category: knownCategory,
    eventType: queryString(req, 'eventType'),
    actorEmail: queryString(req, 'actorEmail'),
    targetId: queryString(req, 'targetId'),
    limit: queryInteger(req, 'limit'),
    offset: queryInteger(req, 'offset'),
  };
}

export function adminRoutes(services: AppServices): Router {
  const { settings, vocabulary, stores, admin, audit, tickets, documents } = services;
  const router = Router();

  router.use(authenticate({ jwtSecret: settings.jwtSecret, profiles: stores.profiles, vocabulary }));
  router.use(requireAdmin());

  // ── Users ───────────────────────────────────────────────────────────

  router.get('/users', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const users = await admin.listUsers(currentUser(req));
      res.json({ users, total: users.length });
    } catch (err) {
      next(err);
    }
  });

  router.post('/users/provision', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const emails: unknown = req.body?.emails;
      const report = await admin.provisionUsers(currentUser(req), emails);
      res.status(report.added.length > 0 ? 201 : 200).json({ report });
    } catch (err) {
      next(err);
    }
  });

  router.get('/users/:email', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = await admin.viewPermissions(currentUser(req), req.params.email);
      res.json({ user });
    } catch (err) {
      next(err);
    }
  });

  router.patch('/users/:email', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const user = await admin.upsertPermissions(currentUser(req), req.params.email, req.body);
      res.json({ user });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/users/:email', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await admin.removeUser(currentUser(req), req.params.email);
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  // ── Requirements ────────────────────────────────────────────────────

  /**
   * POST /api/admin/requirements/derive
   * Body: { paths: string[] }. Shows what each path derives to, with the
   * flat metadata the search index stores. Nothing is written.
   */
  router.post('/requirements/derive', (req: Request, res: Response, next: NextFunction) => {
    try {
      const paths: unknown = req.body?.paths;
      if (!Array.isArray(paths) || !paths.every((item): item is string => typeof item === 'string')) {
        throw new ValidationError('paths must be an array of strings', 'paths');
      }

      const requirements = paths.map((sourcePath) => {
        const requirement = derive(sourcePath, vocabulary);
        return { requirement, metadata: toSearchMetadata(requirement, vocabulary) };
      });
      res.json({ requirements });
    } catch (err) {
      next(err);
    }
  });

  router.post('/requirements/sync', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const caller = currentUser(req);
      const report = await synchronizeRequirements(documents, stores.requirements, vocabulary);

      await audit.record({
        category: 'synchronization',
        eventType: 'requirements.synchronized',
        description: 'Document requirements synchronized',
        actorEmail: caller.email,
        metadata: { ...report },
      });
      res.json({ report });
    } catch (err) {
      next(err);
    }
  });

  // ── Tickets & Audit ─────────────────────────────────────────────────

  router.get('/tickets', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const recent = await tickets.listRecent(queryInteger(req, 'limit'));
      res.json({ tickets: recent });
    } catch (err) {
      next(err);
    }
  });

  router.get('/audit', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const events = await audit.query(parseAuditQuery(req));
      res.json({ events });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
