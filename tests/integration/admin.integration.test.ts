import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  configureHrBackend,
  createTestRuntime,
  loginAs,
  seedPrincipal,
  seedTenant,
  TEST_PASSWORD,
  type TestRuntime
} from '../helpers/create-test-runtime.js';
import { startStubHrServer, unreachableBaseUrl, type StubHrServer } from '../helpers/stub-hr-server.js';

interface ErrorResponse {
  code: string;
  message: string;
}

interface TenantBody {
  id: string;
  name: string;
  is_active: boolean;
}

interface PrincipalBody {
  id: string;
  email: string;
  tenant_id: string;
  is_admin: boolean;
  is_active: boolean;
  full_name: string | null;
  hr_employee_id: number | null;
}

function errorBody(response: request.Response): ErrorResponse {
  return response.body;
}

describe('admin integration', () => {
  let runtime: TestRuntime;
  let homeTenantId: string;
  let adminId: string;
  let adminToken: string;
  let stub: StubHrServer | null = null;

  beforeEach(async () => {
    runtime = createTestRuntime();
    homeTenantId = (await seedTenant(runtime, 'Head Office')).id;
    adminId = (await seedPrincipal(runtime, { email: 'admin@example.com', tenantId: homeTenantId, isAdmin: true })).id;
    await seedPrincipal(runtime, { email: 'staff@example.com', tenantId: homeTenantId });
    adminToken = (await loginAs(runtime, 'admin@example.com')).accessToken;
  });

  afterEach(async () => {
    if (stub !== null) {
      await stub.close();
      stub = null;
    }
    await runtime.close();
  });

  function asAdmin(test: request.Test): request.Test {
    return test.set('Authorization', `Bearer ${adminToken}`);
  }

  async function createTenant(name: string): Promise<TenantBody> {
    const response = await asAdmin(request(runtime.app).post('/v1/admin/tenants')).send({ name });
    expect(response.status).toBe(201);
    return response.body;
  }

  it('requires authentication and the admin flag', async () => {
    const anonymous = await request(runtime.app).get('/v1/admin/tenants');
    const staff = await loginAs(runtime, 'staff@example.com');
    const nonAdmin = await request(runtime.app)
      .get('/v1/admin/tenants')
      .set('Authorization', `Bearer ${staff.accessToken}`);

    expect(anonymous.status).toBe(401);
    expect(errorBody(anonymous).code).toBe('AUTH_REQUIRED');
    expect(nonAdmin.status).toBe(403);
    expect(errorBody(nonAdmin).code).toBe('AUTH_ADMIN_REQUIRED');
  });

  it('creates, lists, reads and deactivates tenants', async () => {
    const created = await createTenant('Branch North');

    const duplicate = await asAdmin(request(runtime.app).post('/v1/admin/tenants')).send({ name: 'Branch North' });
    const listed = await asAdmin(request(runtime.app).get('/v1/admin/tenants'));
    const fetched = await asAdmin(request(runtime.app).get(`/v1/admin/tenants/${created.id}`));
    const deactivated = await asAdmin(request(runtime.app).patch(`/v1/admin/tenants/${created.id}/status`))
      .send({ is_active: false });

    expect(created).toMatchObject({ name: 'Branch North', is_active: true });
    expect(duplicate.status).toBe(409);
    expect(errorBody(duplicate).code).toBe('TENANT_NAME_IN_USE');
    const names = listed.body.map((tenant: TenantBody) => tenant.name);
    expect(names).toContain('Head Office');
    expect(names).toContain('Branch North');
    expect(fetched.body).toMatchObject({ id: created.id, name: 'Branch North' });
    expect(deactivated.status).toBe(200);
    expect(deactivated.body.is_active).toBe(false);
  });

  it('answers 404 for an unknown tenant', async () => {
    const response = await asAdmin(request(runtime.app).get('/v1/admin/tenants/00000000-0000-4000-8000-000000000000'));

    expect(response.status).toBe(404);
    expect(errorBody(response).code).toBe('TENANT_NOT_FOUND');
  });

  it('refuses to delete a tenant that still has users', async () => {
    const occupied = await asAdmin(request(runtime.app).delete(`/v1/admin/tenants/${homeTenantId}`));
    const empty = await createTenant('Short Lived');
    const removed = await asAdmin(request(runtime.app).delete(`/v1/admin/tenants/${empty.id}`));
    const afterwards = await asAdmin(request(runtime.app).get(`/v1/admin/tenants/${empty.id}`));

    expect(occupied.status).toBe(409);
    expect(errorBody(occupied).code).toBe('TENANT_HAS_PRINCIPALS');
    expect(removed.status).toBe(204);
    expect(afterwards.status).toBe(404);
  });

  it('stores the HR configuration without ever returning the key', async () => {
    const before = await asAdmin(request(runtime.app).get(`/v1/admin/tenants/${homeTenantId}/hr-config`));
    const saved = await asAdmin(request(runtime.app).put(`/v1/admin/tenants/${homeTenantId}/hr-config`)).send({
      base_url: 'https://hr.example.test/',
      account_id: 'portal-service',
      api_key: 'test-secret'
    });
    const after = await asAdmin(request(runtime.app).get(`/v1/admin/tenants/${homeTenantId}/hr-config`));

    expect(before.status).toBe(200);
    expect(before.body).toBeNull();
    expect(saved.status).toBe(200);
    expect(saved.body).toMatchObject({
      tenant_id: homeTenantId,
      base_url: 'https://hr.example.test',
      account_id: 'portal-service',
      has_api_key: true
    });
    expect(after.body).not.toHaveProperty('api_key');
    expect(after.body.has_api_key).toBe(true);

    const stored = await runtime.tenantRepository.findCredential(homeTenantId);
    expect(stored?.encryptedApiKey).not.toBe('test-secret');
  });

  it('tests the tenant connection against the HR backend', async () => {
    const backend = await startStubHrServer((app) => {
      app.get('/ess/api/auth-test', (_request, response) => {
        response.json({ status: 'success', message: 'Authentication successful.' });
      });
    });
    stub = backend;
    await configureHrBackend(runtime, homeTenantId, backend.baseUrl);

    const response = await asAdmin(request(runtime.app).post(`/v1/admin/tenants/${homeTenantId}/test-connection`));

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      success: true,
      message: 'Connection successful.',
      details: { status: 'success', message: 'Authentication successful.' }
    });
    expect(backend.requests[0]?.authorization).toBe('Bearer test-service-token');
  });

  it('reports a failed connection test in the body', async () => {
    await configureHrBackend(runtime, homeTenantId, await unreachableBaseUrl());

    const response = await asAdmin(request(runtime.app).post(`/v1/admin/tenants/${homeTenantId}/test-connection`));

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ success: false, message: 'Could not connect to HR system.' });
  });

  it('manages principals', async () => {
    const created = await asAdmin(request(runtime.app).post('/v1/admin/users')).send({
      email: 'new.hire@example.com',
      password: TEST_PASSWORD,
      tenant_id: homeTenantId,
      full_name: 'New Hire',
      hr_employee_id: 12
    });
    const principal: PrincipalBody = created.body;

    const duplicate = await asAdmin(request(runtime.app).post('/v1/admin/users')).send({
      email: 'new.hire@example.com',
      password: TEST_PASSWORD,
      tenant_id: homeTenantId
    });
    const updated = await asAdmin(request(runtime.app).patch(`/v1/admin/users/${principal.id}`))
      .send({ is_admin: true, hr_employee_id: null });
    const fetched = await asAdmin(request(runtime.app).get(`/v1/admin/users/${principal.id}`));
    const listed = await asAdmin(request(runtime.app).get('/v1/admin/users'));
    const deleted = await asAdmin(request(runtime.app).delete(`/v1/admin/users/${principal.id}`));
    const missing = await asAdmin(request(runtime.app).get(`/v1/admin/users/${principal.id}`));

    expect(created.status).toBe(201);
    expect(principal).toMatchObject({
      email: 'new.hire@example.com',
      tenant_id: homeTenantId,
      full_name: 'New Hire',
      hr_employee_id: 12,
      is_admin: false,
      is_active: true
    });
    expect(created.body).not.toHaveProperty('password_hash');
    expect(duplicate.status).toBe(409);
    expect(updated.body).toMatchObject({ is_admin: true, hr_employee_id: null, full_name: 'New Hire' });
    expect(fetched.body.is_admin).toBe(true);
    expect(listed.body.map((entry: PrincipalBody) => entry.email)).toContain('new.hire@example.com');
    expect(deleted.status).toBe(204);
    expect(missing.status).toBe(404);
  });

  it('lets the new principal sign in with the password set by the admin', async () => {
    await asAdmin(request(runtime.app).post('/v1/admin/users')).send({
      email: 'new.hire@example.com',
      password: TEST_PASSWORD,
      tenant_id: homeTenantId
    });

    const tokens = await loginAs(runtime, 'new.hire@example.com');

    expect(tokens.accessToken.length).toBeGreaterThan(0);
  });

  it('rejects unknown fields on a principal update', async () => {
    const staff = await runtime.principalRepository.findPrincipalByEmail('staff@example.com');

    const response = await asAdmin(request(runtime.app).patch(`/v1/admin/users/${staff?.id ?? ''}`))
      .send({ password_hash: 'x' });

    expect(response.status).toBe(400);
  });

  it('does not let an admin delete their own account', async () => {
    const response = await asAdmin(request(runtime.app).delete(`/v1/admin/users/${adminId}`));

    expect(response.status).toBe(400);
    expect(errorBody(response).code).toBe('PRINCIPAL_DELETE_SELF');
  });

  it('searches HR employees in the caller tenant by default', async () => {
    const backend = await startStubHrServer((app) => {
      app.get('/ess/api/admin/employees/search', (_request, response) => {
        response.json([{ id: 7, name: 'Jordan Lee' }]);
      });
    });
    stub = backend;
    await configureHrBackend(runtime, homeTenantId, backend.baseUrl);

    const response = await asAdmin(request(runtime.app).get('/v1/admin/hr-employees/search'))
      .query({ term: 'jor', limit: 5 });

    expect(response.status).toBe(200);
    expect(response.body).toEqual([{ id: 7, name: 'Jordan Lee' }]);
    expect(backend.requests[0]?.query).toEqual({ limit: '5', term: 'jor' });
  });
});
