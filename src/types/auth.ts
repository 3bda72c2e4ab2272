// =============================================================================
// PATHGUARD — Authentication Types
// =============================================================================

import { UserProfile } from './permissions';

/** The authenticated caller, loaded fresh from the profile store per request */
export type RequestUser = UserProfile;

declare global {
  namespace Express {
    interface Request {
      user?: RequestUser;
      requestId?: string;
    }
  }
}
