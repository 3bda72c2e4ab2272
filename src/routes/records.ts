// =============================================================================
// PATHGUARD — Ticket & Feedback Routes
//
//   GET  /api/tickets/teams  — teams a ticket can be routed to
//   POST /api/tickets        — open a ticket for the caller
//   POST /api/feedback       — rate an answer
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { authenticate, currentUser } from '../middleware/authenticate';
import { ValidationError } from '../types/errors';
import { AppServices } from '../services';

function bodyOf(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ValidationError('Request body must be a JSON object');
  }
  return { ...body };
}

export function ticketRoutes(services: AppServices): Router {
  const { settings, vocabulary, stores, tickets } = services;
  const router = Router();

  router.use(authenticate({ jwtSecret: settings.jwtSecret, profiles: stores.profiles, vocabulary }));

  router.get('/teams', (_req: Request, res: Response) => {
    res.json({ teams: tickets.availableTeams });
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const ticket = await tickets.create(currentUser(req).email, bodyOf(req));
      res.status(201).json({ ticket });
    } catch (err) {
      next(err);
    }
  });

  return router;
}

export function feedbackRoutes(services: AppServices): Router {
  const { settings, vocabulary, stores, feedback } = services;
  const router = Router();

  router.use(authenticate({ jwtSecret: settings.jwtSecret, profiles: stores.profiles, vocabulary }));

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const entry = await feedback.record(currentUser(req).email, bodyOf(req));
      res.status(201).json({ feedback: entry });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
