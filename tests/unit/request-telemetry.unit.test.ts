import express, { Router as createRouter } from 'express';
import request from 'supertest';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { attachRequestTelemetry } from '../../src/http/middlewares/request-telemetry.js';

function createTelemetryApp(): express.Express {
  const app = express();
  app.use(attachRequestTelemetry);

  const router = createRouter();
  router.get('/payslips/:id/download', (_request, response) => {
    response.json({ ok: true });
  });
  app.use('/v1/hr', router);

  return app;
}

describe('request telemetry', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('logs the matched route template instead of the raw path', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const response = await request(createTelemetryApp()).get('/v1/hr/payslips/42/download?inline=1');

    expect(response.status).toBe(200);
    await vi.waitFor(() => {
      expect(log).toHaveBeenCalledWith('http_request', expect.objectContaining({
        method: 'GET',
        route: '/v1/hr/payslips/:id/download',
        path: '/v1/hr/payslips/42/download',
        statusCode: 200,
        aborted: false,
        tenantId: null,
        principalId: null
      }));
    });
  });

  it('groups requests no route matched', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    const response = await request(createTelemetryApp()).get('/v1/hr/unknown/7');

    expect(response.status).toBe(404);
    await vi.waitFor(() => {
      expect(log).toHaveBeenCalledWith('http_request', expect.objectContaining({
        route: 'unmatched',
        path: '/v1/hr/unknown/7',
        statusCode: 404
      }));
    });
  });
});
