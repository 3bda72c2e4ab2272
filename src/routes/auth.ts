// =============================================================================
// PATHGUARD — Authentication Routes
//
// Email-only login: identity is asserted upstream (SSO proxy or trusted
// front end); this service maps the identity to its access profile and
// issues a short-lived token.
// =============================================================================

import { Router, Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { authenticate, currentUser } from '../middleware/authenticate';
import { defaultProfile, normalizeEmail, toUserProfile } from '../authorization/profile';
import { NotFoundError } from '../types/errors';
import { AppServices } from '../services';

export function authRoutes(services: AppServices): Router {
  const { settings, vocabulary, stores, audit } = services;
  const router = Router();

  /**
   * POST /api/auth/login
   * Returns a JWT whose subject is the normalized email, plus the profile.
   */
  router.post('/login', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const email = normalizeEmail(req.body?.email);

      let stored = await stores.profiles.get(email);
      let provisioned = false;
      if (!stored) {
        if (!settings.autoProvision) {
          throw new NotFoundError('No access profile for this user');
        }
        const write = await stores.profiles.modify(
          email,
          (current) => current ?? defaultProfile(email, vocabulary)
        );
        stored = write.profile;
        provisioned = write.created;
      }

      const token = jwt.sign({ sub: email }, settings.jwtSecret, {
        expiresIn: settings.jwtExpirySeconds,
      });

      console.log(`[Auth] ${email} logged in${provisioned ? ' (profile provisioned)' : ''}`);
      await audit.record({
        category: 'authentication',
        eventType: provisioned ? 'user.provisioned' : 'user.login',
        description: `User ${email} logged in`,
        actorEmail: email,
        targetType: 'user',
        targetId: email,
        metadata: { ip: req.ip, userAgent: req.headers['user-agent'] },
      });

      res.json({ token, user: toUserProfile(stored, vocabulary) });
    } catch (err) {
      next(err);
    }
  });

  /**
   * GET /api/auth/me
   * The caller's current profile.
   */
  router.get(
    '/me',
    authenticate({ jwtSecret: settings.jwtSecret, profiles: stores.profiles, vocabulary }),
    (req: Request, res: Response, next: NextFunction) => {
      try {
        res.json({ user: currentUser(req) });
      } catch (err) {
        next(err);
      }
    }
  );

  return router;
}
