import { afterEach, describe, expect, it } from 'vitest';

import { DownstreamClient, extractDownstreamMessage, type DownstreamTarget } from '../../src/downstream/downstream-client.js';
import { AppError } from '../../src/errors/app-error.js';
import { startStubHrServer, unreachableBaseUrl, type StubHrServer } from '../helpers/stub-hr-server.js';

async function rejectionOf(promise: Promise<unknown>): Promise<AppError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof AppError) {
      return error;
    }

    throw error;
  }

  throw new Error('Expected the promise to reject.');
}

async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  return Buffer.concat(chunks).toString('utf8');
}

describe('downstream client', () => {
  let stub: StubHrServer | null = null;

  afterEach(async () => {
    if (stub !== null) {
      await stub.close();
      stub = null;
    }
  });

  async function startStub(configure: Parameters<typeof startStubHrServer>[0]): Promise<DownstreamTarget> {
    stub = await startStubHrServer(configure);
    return { baseUrl: stub.baseUrl, serviceToken: 'test-service-token' };
  }

  it('sends the service token and parses the JSON body', async () => {
    const target = await startStub((app) => {
      app.get('/ess/api/leave-types', (_request, response) => {
        response.json([{ id: 1, name: 'Paid Time Off' }]);
      });
    });
    const client = new DownstreamClient({ timeoutMs: 2_000 });

    const body = await client.requestJson(target, '/ess/api/leave-types');

    expect(body).toEqual([{ id: 1, name: 'Paid Time Off' }]);
    expect(stub?.requests[0]?.authorization).toBe('Bearer test-service-token');
  });

  it('forwards JSON bodies and query parameters', async () => {
    const target = await startStub((app) => {
      app.post('/ess/api/leave', (_request, response) => {
        response.status(201).json({ leave_id: 99, state: 'confirm' });
      });
      app.get('/ess/api/admin/employees/search', (_request, response) => {
        response.json([]);
      });
    });
    const client = new DownstreamClient({ timeoutMs: 2_000 });

    const created = await client.requestJson(target, '/ess/api/leave', { method: 'POST', body: { employee_id: 7 } });
    await client.requestJson(target, '/ess/api/admin/employees/search', { params: { term: 'lee', limit: 5 } });

    expect(created).toEqual({ leave_id: 99, state: 'confirm' });
    expect(stub?.requests[0]?.body).toEqual({ employee_id: 7 });
    expect(stub?.requests[1]?.query).toEqual({ term: 'lee', limit: '5' });
  });

  it('resolves an empty 204 response to null', async () => {
    const target = await startStub((app) => {
      app.delete('/ess/api/attachment/4', (_request, response) => {
        response.status(204).end();
      });
    });
    const client = new DownstreamClient({ timeoutMs: 2_000 });

    await expect(client.requestJson(target, '/ess/api/attachment/4', { method: 'DELETE' })).resolves.toBeNull();
  });

  it('keeps a 4xx status and surfaces the downstream message', async () => {
    const target = await startStub((app) => {
      app.get('/ess/api/employee/7', (_request, response) => {
        response.status(404).json({ error: 'Not Found', message: 'Employee not found.' });
      });
      app.get('/ess/api/employee/8', (_request, response) => {
        response.status(403).json({ error: { message: 'Access denied.' } });
      });
    });
    const client = new DownstreamClient({ timeoutMs: 2_000 });

    const notFound = await rejectionOf(client.requestJson(target, '/ess/api/employee/7'));
    const forbidden = await rejectionOf(client.requestJson(target, '/ess/api/employee/8'));

    expect(notFound.statusCode).toBe(404);
    expect(notFound.code).toBe('UPSTREAM_REJECTED');
    expect(notFound.message).toBe('HR backend error: Employee not found.');
    expect(forbidden.statusCode).toBe(403);
    expect(forbidden.message).toBe('HR backend error: Access denied.');
  });

  it('maps a downstream 5xx and an unparsable body to 502', async () => {
    const target = await startStub((app) => {
      app.get('/ess/api/payslips/7', (_request, response) => {
        response.status(500).json({ message: 'Traceback: secret internals' });
      });
      app.get('/ess/api/leave-types', (_request, response) => {
        response.status(200).type('application/json').send('{"broken":');
      });
    });
    const client = new DownstreamClient({ timeoutMs: 2_000 });

    const serverError = await rejectionOf(client.requestJson(target, '/ess/api/payslips/7'));
    const malformed = await rejectionOf(client.requestJson(target, '/ess/api/leave-types'));

    expect(serverError.statusCode).toBe(502);
    expect(serverError.message).toBe('Invalid response from HR system.');
    expect(malformed.statusCode).toBe(502);
    expect(malformed.code).toBe('UPSTREAM_BAD_RESPONSE');
  });

  it('maps a slow downstream to 504', async () => {
    const target = await startStub((app) => {
      app.get('/ess/api/leave-types', (_request, response) => {
        setTimeout(() => {
          response.json([]);
        }, 1_000);
      });
    });
    const client = new DownstreamClient({ timeoutMs: 100 });

    const error = await rejectionOf(client.requestJson(target, '/ess/api/leave-types'));

    expect(error.statusCode).toBe(504);
    expect(error.code).toBe('UPSTREAM_TIMEOUT');
    expect(error.message).toBe('Request to HR system timed out.');
  });

  it('maps a refused connection to 503', async () => {
    const client = new DownstreamClient({ timeoutMs: 2_000 });
    const target: DownstreamTarget = { baseUrl: await unreachableBaseUrl(), serviceToken: 'test-service-token' };

    const error = await rejectionOf(client.requestJson(target, '/ess/api/leave-types'));

    expect(error.statusCode).toBe(503);
    expect(error.code).toBe('UPSTREAM_UNAVAILABLE');
    expect(error.message).toBe('Could not connect to HR system.');
  });

  it('sends multipart fields and files under their field names', async () => {
    const target = await startStub((app) => {
      app.post('/ess/api/expenses', (_request, response) => {
        response.status(201).json({ expense_id: 12 });
      });
    });
    const client = new DownstreamClient({ timeoutMs: 2_000 });

    const body = await client.sendMultipart(target, '/ess/api/expenses', {
      fields: { employee_id: '7', description: 'Taxi', amount: '23.5', date: '2026-04-02' },
      files: [{ field: 'receipt', filename: 'taxi.pdf', content: Buffer.from('%PDF-receipt'), contentType: 'application/pdf' }]
    });

    expect(body).toEqual({ expense_id: 12 });
    expect(stub?.requests[0]?.body).toEqual({ employee_id: '7', description: 'Taxi', amount: '23.5', date: '2026-04-02' });
    expect(stub?.requests[0]?.files).toEqual([
      { field: 'receipt', originalName: 'taxi.pdf', mimeType: 'application/pdf', size: 12 }
    ]);
  });

  it('exposes a download stream with the downstream headers', async () => {
    const target = await startStub((app) => {
      app.get('/ess/api/payslip/5/download', (_request, response) => {
        response.setHeader('Content-Type', 'application/pdf');
        response.setHeader('Content-Disposition', 'attachment; filename="payslip-5.pdf"');
        response.send(Buffer.from('%PDF-payslip'));
      });
    });
    const client = new DownstreamClient({ timeoutMs: 2_000 });

    const download = await client.openDownload(target, '/ess/api/payslip/5/download');
    const content = await readAll(download.stream);
    download.release();

    expect(download.contentType).toBe('application/pdf');
    expect(download.contentDisposition).toBe('attachment; filename="payslip-5.pdf"');
    expect(download.contentLength).toBe(12);
    expect(content).toBe('%PDF-payslip');
  });

  it('translates a failed download before any bytes are relayed', async () => {
    const target = await startStub((app) => {
      app.get('/ess/api/payslip/6/download', (_request, response) => {
        response.status(404).json({ message: 'Payslip not found.' });
      });
    });
    const client = new DownstreamClient({ timeoutMs: 2_000 });

    const error = await rejectionOf(client.openDownload(target, '/ess/api/payslip/6/download'));

    expect(error.statusCode).toBe(404);
    expect(error.message).toBe('HR backend error: Payslip not found.');
  });
});

describe('extractDownstreamMessage', () => {
  it('reads the common error body shapes', () => {
    expect(extractDownstreamMessage('{"message":"a"}', 'fallback')).toBe('a');
    expect(extractDownstreamMessage('{"error":"b"}', 'fallback')).toBe('b');
    expect(extractDownstreamMessage('{"error":{"message":"c"}}', 'fallback')).toBe('c');
    expect(extractDownstreamMessage('{"error_description":"d"}', 'fallback')).toBe('d');
    expect(extractDownstreamMessage('{"detail":"e"}', 'fallback')).toBe('e');
  });

  it('falls back for empty or unrecognised bodies', () => {
    expect(extractDownstreamMessage('', 'HTTP 400')).toBe('HTTP 400');
    expect(extractDownstreamMessage('[1]', 'HTTP 400')).toBe('HTTP 400');
    expect(extractDownstreamMessage('plain text reason', 'HTTP 400')).toBe('plain text reason');
  });
});
