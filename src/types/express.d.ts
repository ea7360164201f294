import type { RequestAuthContext } from '../auth/auth-context.js';

declare global {
  namespace Express {
    interface Request {
      /** Set by `requireAuth` once the bearer access token has been verified. */
      authContext?: RequestAuthContext;
    }

    interface Locals {
      traceId?: string;
    }
  }
}
