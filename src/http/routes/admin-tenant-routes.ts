import type { Router } from 'express';
import { Router as createRouter } from 'express';
import { z } from 'zod';

import type { Tenant } from '../../repositories/tenant-repository.js';
import type { TenantCredentialStore, TenantCredentialSummary } from '../../services/tenant-credential-store.js';
import type { TenantService } from '../../services/tenant-service.js';

export const pageQuerySchema = z.object({
  skip: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(100).default(100)
});

const tenantIdParamSchema = z.string().uuid();

const createTenantSchema = z.object({
  name: z.string().trim().min(1).max(200),
  is_active: z.boolean().default(true)
});

const tenantStatusSchema = z.object({
  is_active: z.boolean()
});

const hrConfigSchema = z.object({
  base_url: z.string().url(),
  account_id: z.string().trim().min(1),
  api_key: z.string().min(1)
});

export function toTenantResponse(tenant: Tenant) {
  return {
    id: tenant.id,
    name: tenant.name,
    is_active: tenant.isActive,
    created_at: tenant.createdAt.toISOString(),
    updated_at: tenant.updatedAt.toISOString()
  };
}

function toHrConfigResponse(summary: TenantCredentialSummary) {
  return {
    tenant_id: summary.tenantId,
    base_url: summary.baseUrl,
    account_id: summary.accountId,
    has_api_key: summary.hasApiKey,
    updated_at: summary.updatedAt.toISOString()
  };
}

export function createAdminTenantRoutes(tenantService: TenantService, credentialStore: TenantCredentialStore): Router {
  const router = createRouter();

  router.get('/', async (request, response, next) => {
    try {
      const query = pageQuerySchema.parse(request.query);
      const tenants = await tenantService.listTenants({ offset: query.skip, limit: query.limit });
      response.status(200).json(tenants.map(toTenantResponse));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (request, response, next) => {
    try {
      const payload = createTenantSchema.parse(request.body);
      const tenant = await tenantService.createTenant(payload.name, payload.is_active);
      response.status(201).json(toTenantResponse(tenant));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId', async (request, response, next) => {
    try {
      const tenantId = tenantIdParamSchema.parse(request.params.tenantId);
      response.status(200).json(toTenantResponse(await tenantService.getTenant(tenantId)));
    } catch (error) {
      next(error);
    }
  });

  router.patch('/:tenantId/status', async (request, response, next) => {
    try {
      const tenantId = tenantIdParamSchema.parse(request.params.tenantId);
      const payload = tenantStatusSchema.parse(request.body);
      const tenant = await tenantService.setTenantActive(tenantId, payload.is_active);
      response.status(200).json(toTenantResponse(tenant));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:tenantId', async (request, response, next) => {
    try {
      const tenantId = tenantIdParamSchema.parse(request.params.tenantId);
      await tenantService.deleteTenant(tenantId);
      response.status(204).send();
    } catch (error) {
      next(error);
    }
  });

  router.get('/:tenantId/hr-config', async (request, response, next) => {
    try {
      const tenantId = tenantIdParamSchema.parse(request.params.tenantId);
      await tenantService.getTenant(tenantId);
      const summary = await credentialStore.describe(tenantId);
      response.status(200).json(summary === null ? null : toHrConfigResponse(summary));
    } catch (error) {
      next(error);
    }
  });

  router.put('/:tenantId/hr-config', async (request, response, next) => {
    try {
      const tenantId = tenantIdParamSchema.parse(request.params.tenantId);
      const payload = hrConfigSchema.parse(request.body);
      const summary = await credentialStore.upsert(tenantId, {
        baseUrl: payload.base_url,
        accountId: payload.account_id,
        apiKey: payload.api_key
      });
      response.status(200).json(toHrConfigResponse(summary));
    } catch (error) {
      next(error);
    }
  });

  router.post('/:tenantId/test-connection', async (request, response, next) => {
    try {
      const tenantId = tenantIdParamSchema.parse(request.params.tenantId);
      response.status(200).json(await tenantService.testConnection(tenantId));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
