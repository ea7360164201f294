import type { Router } from 'express';
import { Router as createRouter } from 'express';
import { z } from 'zod';

import type { HrPortalService } from '../../services/hr-portal-service.js';
import type { PrincipalAdminService, PrincipalView } from '../../services/principal-admin-service.js';
import { getAuthContext } from '../middlewares/require-auth.js';
import { pageQuerySchema } from './admin-tenant-routes.js';

const principalIdParamSchema = z.string().uuid();

const createPrincipalSchema = z.object({
  email: z.string().email(),
  password: z.string().min(1),
  tenant_id: z.string().uuid(),
  full_name: z.string().max(200).nullish(),
  job_title: z.string().max(200).nullish(),
  phone: z.string().max(50).nullish(),
  is_active: z.boolean().optional(),
  is_admin: z.boolean().optional(),
  hr_employee_id: z.number().int().positive().nullish()
});

const updatePrincipalSchema = z.object({
  email: z.string().email().optional(),
  password: z.string().min(1).optional(),
  tenant_id: z.string().uuid().optional(),
  full_name: z.string().max(200).nullable().optional(),
  job_title: z.string().max(200).nullable().optional(),
  phone: z.string().max(50).nullable().optional(),
  is_active: z.boolean().optional(),
  is_admin: z.boolean().optional(),
  hr_employee_id: z.number().int().positive().nullable().optional()
}).strict();

const employeeSearchSchema = z.object({
  tenant_id: z.string().uuid().optional(),
  term: z.string().trim().max(200).optional(),
  limit: z.coerce.number().int().min(1).max(100).default(10)
});

function toPrincipalResponse(view: PrincipalView) {
  return {
    id: view.id,
    email: view.email,
    full_name: view.fullName,
    job_title: view.jobTitle,
    phone: view.phone,
    tenant_id: view.tenantId,
    is_active: view.isActive,
    is_admin: view.isAdmin,
    hr_employee_id: view.hrEmployeeId,
    created_at: view.createdAt.toISOString(),
    updated_at: view.updatedAt.toISOString()
  };
}

export function createAdminUserRoutes(principalAdminService: PrincipalAdminService): Router {
  const router = createRouter();

  router.get('/', async (request, response, next) => {
    try {
      const query = pageQuerySchema.parse(request.query);
      const principals = await principalAdminService.listPrincipals({ offset: query.skip, limit: query.limit });
      response.status(200).json(principals.map(toPrincipalResponse));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (request, response, next) => {
    try {
      const payload = createPrincipalSchema.parse(request.body);
      const principal = await principalAdminService.createPrincipal({
        email: payload.email,
        password: payload.password,
        tenantId: payload.tenant_id,
        fullName: payload.full_name,
        jobTitle: payload.job_title,
        phone: payload.phone,
        isActive: payload.is_active,
        isAdmin: payload.is_admin,
        hrEmployeeId: payload.hr_employee_id
      });
      response.status(201).json(toPrincipalResponse(principal));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:principalId', async (request, response, next) => {
    try {
      const principalId = principalIdParamSchema.parse(request.params.principalId);
      response.status(200).json(toPrincipalResponse(await principalAdminService.getPrincipal(principalId)));
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:principalId', async (request, response, next) => {
    try {
      const principalId = principalIdParamSchema.parse(request.params.principalId);
      const payload = updatePrincipalSchema.parse(request.body);
      const principal = await principalAdminService.updatePrincipal(principalId, {
        email: payload.email,
        password: payload.password,
        tenantId: payload.tenant_id,
        fullName: payload.full_name,
        jobTitle: payload.job_title,
        phone: payload.phone,
        isActive: payload.is_active,
        isAdmin: payload.is_admin,
        hrEmployeeId: payload.hr_employee_id
      });
      response.status(200).json(toPrincipalResponse(principal));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:principalId', async (request, response, next) => {
    try {
      const principalId = principalIdParamSchema.parse(request.params.principalId);
      await principalAdminService.deletePrincipal(getAuthContext(request).principalId, principalId);
      response.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  return router;
}

export function createHrEmployeeSearchRoutes(hrPortalService: HrPortalService): Router {
  const router = createRouter();

  router.get('/search', async (request, response, next) => {
    try {
      const query = employeeSearchSchema.parse(request.query);
      const results = await hrPortalService.searchEmployees({
        tenantId: query.tenant_id ?? getAuthContext(request).tenantId,
        term: query.term,
        limit: query.limit
      });
      response.status(200).json(results);
    } catch (error) {
      next(error);
    }
  });

  return router;
}
