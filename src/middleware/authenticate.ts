// =============================================================================
// PATHGUARD — Authentication Middleware
//
// Verifies the JWT Bearer token and attaches the caller's current profile to
// the request. The profile is re-read on every request, so permission
// changes take effect without a new login.
// =============================================================================

import { Request, Response, NextFunction, RequestHandler } from 'express';
import jwt, { JwtPayload as TokenClaims, TokenExpiredError } from 'jsonwebtoken';
import { toUserProfile } from '../authorization/profile';
import { hasAdminOverride } from '../authorization/evaluator';
import { AuthenticationError, AuthorizationError } from '../types/errors';
import { ProfileStore } from '../types/stores';
import { TagVocabulary } from '../types/vocabulary';
import { RequestUser } from '../types/auth';

export interface AuthenticateDeps {
  jwtSecret: string;
  profiles: ProfileStore;
  vocabulary: TagVocabulary;
}

/** Subject (email) of a valid token */
export function verifyToken(token: string, secret: string): string {
  let payload: string | TokenClaims;
  try {
    payload = jwt.verify(token, secret);
  } catch (err) {
    if (err instanceof TokenExpiredError) {
      throw new AuthenticationError('Token expired');
    }
    throw new AuthenticationError('Invalid token');
  }

  if (typeof payload === 'string' || typeof payload.sub !== 'string') {
    throw new AuthenticationError('Invalid token');
  }
  return payload.sub;
}

/**
 * Authenticate incoming requests via JWT Bearer token.
 * A valid token whose user has since been removed is rejected.
 */
export function authenticate(deps: AuthenticateDeps): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      const authHeader = req.headers.authorization;
      if (!authHeader?.startsWith('Bearer ')) {
        throw new AuthenticationError('Authentication required');
      }

      const email = verifyToken(authHeader.slice(7), deps.jwtSecret);
      const stored = await deps.profiles.get(email);
      if (!stored) {
        throw new AuthenticationError('User no longer exists');
      }

      req.user = toUserProfile(stored, deps.vocabulary);
      next();
    } catch (err) {
      next(err);
    }
  };
}

/** The authenticated caller; use only behind authenticate() */
export function currentUser(req: Request): RequestUser {
  if (!req.user) {
    throw new AuthenticationError('Authentication required');
  }
  return req.user;
}

/**
 * Restrict a router to callers holding the admin override.
 * Must be used AFTER authenticate middleware.
 */
export function requireAdmin(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (!hasAdminOverride(currentUser(req))) {
        throw new AuthorizationError('Administrator privileges required');
      }
      next();
    } catch (err) {
      next(err);
    }
  };
}
