import type { NextFunction, Request, RequestHandler, Response } from 'express';

import type { RequestAuthContext } from '../../auth/auth-context.js';
import { AppError } from '../../errors/app-error.js';
import type { AuthService } from '../../services/auth-service.js';

function readBearerToken(request: Request): string | null {
  const header = request.header('authorization');
  if (header === undefined) {
    return null;
  }

  const [scheme, token] = header.split(' ');
  if (scheme === undefined || scheme.toLowerCase() !== 'bearer' || token === undefined || token.length === 0) {
    return null;
  }

  return token;
}

export function createRequireAuth(authService: AuthService): RequestHandler {
  return async (request, _response, next) => {
    const token = readBearerToken(request);
    if (token === null) {
      next(new AppError(401, 'AUTH_REQUIRED', 'Not authenticated.'));
      return;
    }

    try {
      request.authContext = await authService.authenticate(token);
      next();
    } catch (error) {
      next(error);
    }
  };
}

export function requireAdmin(request: Request, _response: Response, next: NextFunction): void {
  if (request.authContext === undefined) {
    next(new AppError(401, 'AUTH_REQUIRED', 'Not authenticated.'));
    return;
  }

  if (!request.authContext.isAdmin) {
    next(new AppError(403, 'AUTH_ADMIN_REQUIRED', "The user doesn't have enough privileges."));
    return;
  }

  next();
}

/** Returns the authenticated caller, for handlers mounted behind `createRequireAuth`. */
export function getAuthContext(request: Request): RequestAuthContext {
  if (request.authContext === undefined) {
    throw new AppError(401, 'AUTH_REQUIRED', 'Not authenticated.');
  }

  return request.authContext;
}
