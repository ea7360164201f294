import { once } from 'node:events';
import http from 'node:http';
import type { AddressInfo } from 'node:net';

import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  configureHrBackend,
  createTestRuntime,
  loginAs,
  seedPrincipal,
  seedTenant,
  type TestRuntime
} from '../helpers/create-test-runtime.js';
import { startStubHrServer, unreachableBaseUrl, type StubHrServer } from '../helpers/stub-hr-server.js';

interface ErrorResponse {
  code: string;
  message: string;
}

function errorBody(response: request.Response): ErrorResponse {
  return response.body;
}

describe('HR proxy integration', () => {
  let runtime: TestRuntime;
  let tenantId: string;
  let accessToken: string;
  let stub: StubHrServer | null = null;

  beforeEach(async () => {
    runtime = createTestRuntime();
    tenantId = (await seedTenant(runtime, 'Acme')).id;
    await seedPrincipal(runtime, { email: 'alice@example.com', tenantId, hrEmployeeId: 7, fullName: 'Alice Example' });
    await seedPrincipal(runtime, { email: 'carol@example.com', tenantId });
    accessToken = (await loginAs(runtime, 'alice@example.com')).accessToken;
  });

  afterEach(async () => {
    if (stub !== null) {
      await stub.close();
      stub = null;
    }
    await runtime.close();
  });

  async function useBackend(configure: Parameters<typeof startStubHrServer>[0]): Promise<StubHrServer> {
    const started = await startStubHrServer(configure);
    stub = started;
    await configureHrBackend(runtime, tenantId, started.baseUrl);
    return started;
  }

  function authorized(test: request.Test): request.Test {
    return test.set('Authorization', `Bearer ${accessToken}`);
  }

  it('submits a leave request and relays the downstream body unchanged', async () => {
    const backend = await useBackend((app) => {
      app.post('/ess/api/leave', (_request, response) => {
        response.status(201).json({ leave_id: 99, state: 'confirm' });
      });
    });

    const response = await authorized(request(runtime.app).post('/v1/hr/leave-requests'))
      .send({ leave_type_id: 2, from: '2026-06-01', to: '2026-06-03' });

    expect(response.status).toBe(201);
    expect(response.body).toEqual({ leave_id: 99, state: 'confirm' });
    expect(backend.requests).toHaveLength(1);
    expect(backend.requests[0]).toMatchObject({
      method: 'POST',
      path: '/ess/api/leave',
      authorization: 'Bearer test-service-token',
      body: { employee_id: 7, leave_type_id: 2, from_date: '2026-06-01', to_date: '2026-06-03', note: null }
    });
  });

  it('answers 503 when the HR backend cannot be reached', async () => {
    await configureHrBackend(runtime, tenantId, await unreachableBaseUrl());

    const response = await authorized(request(runtime.app).post('/v1/hr/leave-requests'))
      .send({ leave_type_id: 2, from: '2026-06-01', to: '2026-06-03' });

    expect(response.status).toBe(503);
    expect(errorBody(response)).toMatchObject({ code: 'UPSTREAM_UNAVAILABLE', message: 'Could not connect to HR system.' });
  });

  it('answers 503 when the tenant has no HR configuration', async () => {
    const response = await authorized(request(runtime.app).get('/v1/hr/leave-types'));

    expect(response.status).toBe(503);
    expect(errorBody(response).code).toBe('HR_NOT_CONFIGURED');
  });

  it('rejects leave requests from users without an HR link', async () => {
    await useBackend(() => undefined);
    const carol = await loginAs(runtime, 'carol@example.com');

    const response = await request(runtime.app)
      .post('/v1/hr/leave-requests')
      .set('Authorization', `Bearer ${carol.accessToken}`)
      .send({ leave_type_id: 2, from: '2026-06-01', to: '2026-06-03' });

    expect(response.status).toBe(400);
    expect(errorBody(response).code).toBe('HR_NOT_LINKED');
  });

  it('validates the leave dates before calling downstream', async () => {
    const backend = await useBackend(() => undefined);

    const response = await authorized(request(runtime.app).post('/v1/hr/leave-requests'))
      .send({ leave_type_id: 2, from: '2026-06-03', to: '2026-06-01' });

    expect(response.status).toBe(400);
    expect(backend.requests).toHaveLength(0);
  });

  it('keeps a downstream 4xx status with its message', async () => {
    await useBackend((app) => {
      app.get('/ess/api/leave-types', (_request, response) => {
        response.status(403).json({ error: 'Forbidden', message: 'Token does not have scope for \'hr.leave.type\'.' });
      });
    });

    const response = await authorized(request(runtime.app).get('/v1/hr/leave-types'));

    expect(response.status).toBe(403);
    expect(errorBody(response)).toMatchObject({
      code: 'UPSTREAM_REJECTED',
      message: "HR backend error: Token does not have scope for 'hr.leave.type'."
    });
  });

  it('merges the HR employee record into the profile', async () => {
    await useBackend((app) => {
      app.get('/ess/api/employee/7', (_request, response) => {
        response.json({ id: 7, name: 'Alice A. Example', job_title: 'Engineer', work_phone: '+1 555 0100', department: 'R&D' });
      });
    });

    const response = await authorized(request(runtime.app).get('/v1/users/me'));

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      email: 'alice@example.com',
      full_name: 'Alice A. Example',
      job_title: 'Engineer',
      phone: '+1 555 0100',
      is_admin: false,
      hr_employee_id: 7,
      address: null,
      department: 'R&D'
    });
  });

  it('degrades dashboard widgets to placeholders on downstream failure', async () => {
    await useBackend((app) => {
      app.get('/ess/api/leaves/pending-count/7', (_request, response) => {
        response.status(500).json({ message: 'boom' });
      });
      app.get('/ess/api/leaves/next-off/7', (_request, response) => {
        response.json({ employee_id: 7, next_day_off: false });
      });
    });

    const pending = await authorized(request(runtime.app).get('/v1/hr/dashboard/pending-leaves-count'));
    const nextOff = await authorized(request(runtime.app).get('/v1/hr/dashboard/next-day-off'));

    expect(pending.status).toBe(200);
    expect(pending.body).toEqual({ employee_id: 7, pending_leave_count: 0 });
    expect(nextOff.status).toBe(200);
    expect(nextOff.body).toEqual({ employee_id: 7, message: 'No upcoming approved leave found.' });
  });

  it('streams a payslip with the downstream headers', async () => {
    await useBackend((app) => {
      app.get('/ess/api/payslip/5/download', (_request, response) => {
        response.setHeader('Content-Type', 'application/pdf');
        response.setHeader('Content-Disposition', 'attachment; filename="payslip-5.pdf"');
        response.send(Buffer.from('%PDF-payslip'));
      });
    });

    const response = await authorized(request(runtime.app).get('/v1/hr/payslips/5/download')).responseType('blob');

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toBe('application/pdf');
    expect(response.headers['content-disposition']).toBe('attachment; filename="payslip-5.pdf"');
    expect(Buffer.from(response.body).toString('utf8')).toBe('%PDF-payslip');
  });

  it('drops the upstream download when the client disconnects mid-stream', async () => {
    let upstreamClosed = false;
    await useBackend((app) => {
      app.get('/ess/api/payslip/9/download', (_request, response) => {
        response.setHeader('Content-Type', 'application/pdf');
        response.write('%PDF-chunk');
        const timer = setInterval(() => {
          response.write('-more');
        }, 20);
        response.on('close', () => {
          clearInterval(timer);
          upstreamClosed = true;
        });
      });
    });

    const gateway = runtime.app.listen(0, '127.0.0.1');
    await once(gateway, 'listening');

    try {
      const address: AddressInfo | string | null = gateway.address();
      if (address === null || typeof address === 'string') {
        throw new Error('Gateway is not listening on a TCP port.');
      }

      await new Promise<void>((resolve, reject) => {
        const clientRequest = http.get(
          {
            host: '127.0.0.1',
            port: address.port,
            path: '/v1/hr/payslips/9/download',
            headers: { Authorization: `Bearer ${accessToken}` }
          },
          (response) => {
            response.once('data', () => {
              clientRequest.destroy();
              resolve();
            });
          }
        );
        clientRequest.on('error', reject);
      });

      await vi.waitFor(() => {
        expect(upstreamClosed).toBe(true);
      }, { timeout: 2_000 });
    } finally {
      gateway.closeAllConnections();
      await new Promise<void>((resolve) => {
        gateway.close(() => {
          resolve();
        });
      });
    }
  });

  it('submits an expense with its receipt as multipart', async () => {
    const backend = await useBackend((app) => {
      app.post('/ess/api/expenses', (_request, response) => {
        response.status(201).json({ expense_id: 12 });
      });
    });

    const response = await authorized(request(runtime.app).post('/v1/hr/expenses'))
      .field('description', 'Taxi')
      .field('amount', '23.5')
      .field('date', '2026-04-02')
      .attach('receipt', Buffer.from('%PDF-receipt'), { filename: 'taxi.pdf', contentType: 'application/pdf' });

    expect(response.status).toBe(201);
    expect(response.body).toEqual({ expense_id: 12 });
    expect(backend.requests[0]?.body).toEqual({ employee_id: '7', description: 'Taxi', amount: '23.5', date: '2026-04-02' });
    expect(backend.requests[0]?.files).toEqual([
      { field: 'receipt', originalName: 'taxi.pdf', mimeType: 'application/pdf', size: 12 }
    ]);
  });

  it('requires the receipt file for an expense', async () => {
    await useBackend(() => undefined);

    const response = await authorized(request(runtime.app).post('/v1/hr/expenses'))
      .field('description', 'Taxi')
      .field('amount', '23.5')
      .field('date', '2026-04-02');

    expect(response.status).toBe(400);
    expect(errorBody(response).code).toBe('UPLOAD_MISSING');
  });

  it('uploads, lists and deletes documents', async () => {
    const backend = await useBackend((app) => {
      app.post('/ess/api/employee/7/document', (_request, response) => {
        response.status(201).json({ message: 'Document uploaded.', attachment_id: 41 });
      });
      app.get('/ess/api/employee/7/documents', (_request, response) => {
        response.json([{ id: 41, name: 'contract.pdf' }]);
      });
      app.delete('/ess/api/attachment/41', (_request, response) => {
        response.json({ message: 'Document deleted.' });
      });
    });

    const uploaded = await authorized(request(runtime.app).post('/v1/hr/documents'))
      .field('document_type', 'contract')
      .attach('file', Buffer.from('%PDF-contract'), { filename: 'contract.pdf', contentType: 'application/pdf' });
    const listed = await authorized(request(runtime.app).get('/v1/hr/documents'));
    const deleted = await authorized(request(runtime.app).delete('/v1/hr/documents/41'));

    expect(uploaded.status).toBe(201);
    expect(uploaded.body).toEqual({
      message: 'Document uploaded.',
      document: { message: 'Document uploaded.', attachment_id: 41 }
    });
    expect(backend.requests[0]?.body).toEqual({ document_type: 'contract' });
    expect(backend.requests[0]?.files[0]?.field).toBe('file');
    expect(listed.body).toEqual([{ id: 41, name: 'contract.pdf' }]);
    expect(deleted.body).toEqual({ message: 'Document deleted.' });
  });

  it('lists no documents when the HR backend fails', async () => {
    await useBackend((app) => {
      app.get('/ess/api/employee/7/documents', (_request, response) => {
        response.status(500).send('Internal Server Error');
      });
    });

    const response = await authorized(request(runtime.app).get('/v1/hr/documents'));

    expect(response.status).toBe(200);
    expect(response.body).toEqual([]);
  });

  it('checks in with the employee id as a form field', async () => {
    const backend = await useBackend((app) => {
      app.post('/ess/api/attendance/check-in', (_request, response) => {
        response.status(201).json({ attendance_id: 3, status: 'checked_in' });
      });
    });

    const response = await authorized(request(runtime.app).post('/v1/hr/attendance/check-in'));

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ attendance_id: 3, status: 'checked_in' });
    expect(backend.requests[0]?.body).toEqual({ employee_id: '7' });
  });

  it('reports an unknown attendance status for users without an HR link', async () => {
    const carol = await loginAs(runtime, 'carol@example.com');

    const response = await request(runtime.app)
      .get('/v1/hr/attendance/status')
      .set('Authorization', `Bearer ${carol.accessToken}`);

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ status: 'unknown', message: 'Not linked to HR system.' });
  });
});
