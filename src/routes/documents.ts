// =============================================================================
// PATHGUARD — Document Visibility Routes
//
//   POST /api/documents/visible  — subset of candidate paths the caller may see
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import { authenticate, currentUser } from '../middleware/authenticate';
import { filterVisible } from '../services/requirements';
import { ValidationError } from '../types/errors';
import { AppServices } from '../services';

const MAX_CANDIDATES = 1000;

function parsePaths(value: unknown): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new ValidationError('paths must be an array of strings', 'paths');
  }
  if (value.length > MAX_CANDIDATES) {
    throw new ValidationError(`At most ${MAX_CANDIDATES} paths per request`, 'paths');
  }
  return value;
}

export function documentRoutes(services: AppServices): Router {
  const { settings, vocabulary, stores } = services;
  const router = Router();

  router.use(authenticate({ jwtSecret: settings.jwtSecret, profiles: stores.profiles, vocabulary }));

  router.post('/visible', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const paths = parsePaths(req.body?.paths);
      const visible = await filterVisible(currentUser(req), paths, stores.requirements, vocabulary);
      res.json({ visible });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
