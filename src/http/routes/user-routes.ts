import type { Router } from 'express';
import { Router as createRouter } from 'express';

import type { HrPortalService } from '../../services/hr-portal-service.js';
import { getAuthContext } from '../middlewares/require-auth.js';

export function createUserRoutes(hrPortalService: HrPortalService): Router {
  const router = createRouter();

  router.get('/me', async (request, response, next) => {
    try {
      response.status(200).json(await hrPortalService.getProfile(getAuthContext(request)));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
