import type { Router } from 'express';
import { Router as createRouter } from 'express';
import { z } from 'zod';

import type { AuthService } from '../../services/auth-service.js';
import type { TokenPair } from '../../services/token-service.js';

const loginSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1)
});

const refreshSchema = z.object({
  refresh_token: z.string().min(1)
});

const forgotPasswordSchema = z.object({
  email: z.string().email()
});

const resetPasswordSchema = z.object({
  token: z.string().min(16),
  new_password: z.string().min(1)
});

function toTokenResponse(pair: TokenPair) {
  return {
    access_token: pair.accessToken,
    refresh_token: pair.refreshToken,
    token_type: 'bearer'
  };
}

export function createAuthRoutes(authService: AuthService): Router {
  const router = createRouter();

  router.post('/login', async (request, response, next) => {
    try {
      const payload = loginSchema.parse(request.body);
      const pair = await authService.login(payload.email, payload.password, new Date());
      response.status(200).json(toTokenResponse(pair));
    } catch (error) {
      next(error);
    }
  });

  router.post('/refresh-token', async (request, response, next) => {
    try {
      const payload = refreshSchema.parse(request.body);
      const pair = await authService.refresh(payload.refresh_token);
      response.status(200).json(toTokenResponse(pair));
    } catch (error) {
      next(error);
    }
  });

  router.post('/password/forgot', async (request, response, next) => {
    try {
      const payload = forgotPasswordSchema.parse(request.body);
      const message = await authService.requestPasswordReset(payload.email);
      response.status(202).json({ message });
    } catch (error) {
      next(error);
    }
  });

  router.post('/password/reset', async (request, response, next) => {
    try {
      const payload = resetPasswordSchema.parse(request.body);
      await authService.resetPassword(payload.token, payload.new_password);
      response.status(200).json({ message: 'Password has been reset successfully.' });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
