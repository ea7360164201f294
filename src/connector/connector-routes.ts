import express, { Router as createRouter, type Request, type RequestHandler, type Response, type Router } from 'express';
import multer from 'multer';
import { z } from 'zod';

import type { ResourceKind } from '../auth/auth-context.js';
import { AppError } from '../errors/app-error.js';
import type { HrBackend, HrFile, HrUpload } from './hr-backend.js';
import type { ConnectorCallContext, GuardRequest, HandlerResult, InboundGuard } from './inbound-guard.js';

const MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

type RouteHandler = (request: Request, response: Response, context: ConnectorCallContext) => Promise<HandlerResult>;

export interface ConnectorRoute {
  method: 'get' | 'post' | 'delete';
  path: string;
  resourceKind: ResourceKind | null;
  handle: RouteHandler;
}

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Dates must be YYYY-MM-DD.');

const leaveSchema = z.object({
  employee_id: z.coerce.number().int().positive(),
  leave_type_id: z.coerce.number().int().positive(),
  from_date: isoDate,
  to_date: isoDate,
  note: z.string().nullish()
});

const expenseSchema = z.object({
  employee_id: z.coerce.number().int().positive(),
  description: z.string().min(1),
  amount: z.coerce.number().positive(),
  date: isoDate
});

const employeeIdFieldSchema = z.object({
  employee_id: z.coerce.number().int().positive()
});

const searchSchema = z.object({
  term: z.string().optional(),
  limit: z.coerce.number().int().positive().max(100).default(10)
});

const documentSchema = z.object({
  document_type: z.string().min(1)
});

function badRequest(message: string): AppError {
  return new AppError(400, 'Bad Request', message);
}

function parseInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (result.success) {
    return result.data;
  }

  const [issue] = result.error.issues;
  const field = issue === undefined ? '' : issue.path.join('.');
  throw badRequest(issue === undefined ? 'Invalid request.' : `Invalid '${field}': ${issue.message}`);
}

function requireFields(body: unknown, fields: readonly string[]): void {
  const record: Record<string, unknown> = typeof body === 'object' && body !== null ? { ...body } : {};
  const missing = fields.filter((field) => record[field] === undefined || record[field] === null || record[field] === '');

  if (missing.length > 0) {
    throw badRequest(`Missing required fields: ${missing.join(', ')}`);
  }
}

function numericParam(request: Request, name: string): number {
  return parseInput(z.coerce.number().int().positive(), request.params[name]);
}

function json(status: number, body: unknown): HandlerResult {
  return { kind: 'json', status, body };
}

function file(hrFile: HrFile): HandlerResult {
  return {
    kind: 'file',
    status: 200,
    filename: hrFile.filename,
    contentType: hrFile.contentType,
    content: hrFile.content
  };
}

function toUpload(uploaded: Express.Multer.File | undefined): HrUpload | null {
  if (uploaded === undefined) {
    return null;
  }

  return {
    originalName: uploaded.originalname,
    mimeType: uploaded.mimetype,
    content: uploaded.buffer
  };
}

const parseJsonBody = express.json();
const parseFormBody = express.urlencoded({ extended: false });

/** Body-parser and multer failures become `AppError`s so the guard logs them like any handler error. */
function translateBodyError(error: unknown): unknown {
  if (error instanceof multer.MulterError) {
    return badRequest(`Upload rejected: ${error.message}`);
  }

  if (error instanceof Error && 'type' in error && error.type === 'entity.parse.failed') {
    return badRequest('Request body is not valid JSON.');
  }

  if (error instanceof Error && 'status' in error && typeof error.status === 'number' && error.status >= 400 && error.status < 500) {
    return new AppError(error.status, error.status === 413 ? 'Payload Too Large' : 'Bad Request', error.message);
  }

  return error;
}

function runMiddleware(middleware: RequestHandler, request: Request, response: Response): Promise<void> {
  return new Promise((resolve, reject) => {
    middleware(request, response, (error?: unknown) => {
      if (error !== undefined && error !== null) {
        reject(translateBodyError(error));
        return;
      }

      resolve();
    });
  });
}

async function readBody(request: Request, response: Response): Promise<void> {
  await runMiddleware(parseJsonBody, request, response);
  await runMiddleware(parseFormBody, request, response);
}

function contentDisposition(filename: string): string {
  const fallback = filename.replace(/[^\x20-\x7e]/g, '_').replace(/"/g, '');
  return `attachment; filename="${fallback}"; filename*=UTF-8''${encodeURIComponent(filename)}`;
}

function sendResult(response: Response, result: HandlerResult): void {
  if (result.kind === 'file') {
    response
      .status(result.status)
      .setHeader('Content-Type', result.contentType)
      .setHeader('Content-Disposition', contentDisposition(result.filename))
      .setHeader('Content-Length', String(result.content.length));
    response.end(result.content);
    return;
  }

  response.status(result.status).json(result.body);
}

function toGuardRequest(request: Request): GuardRequest {
  const [endpoint] = request.originalUrl.split('?');

  return {
    method: request.method,
    endpoint: endpoint ?? request.path,
    ip: typeof request.ip === 'string' && request.ip.length > 0 ? request.ip : null,
    authorization: request.header('authorization')
  };
}

/** Every guarded connector endpoint with the resource kind its token must cover. */
export function buildConnectorRoutes(backend: HrBackend): ConnectorRoute[] {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: MAX_UPLOAD_BYTES, files: 1 }
  });

  return [
    {
      method: 'get',
      path: '/auth-test',
      resourceKind: null,
      handle: (_request, _response, context) => Promise.resolve(json(200, {
        status: 'success',
        message: 'Authentication successful.',
        authenticated_account_login: context.account.login,
        authenticated_account_id: context.account.id,
        authenticated_account_name: context.account.name
      }))
    },
    {
      method: 'get',
      path: '/employee/:employeeId(\\d+)',
      resourceKind: 'hr.employee',
      handle: async (request, _response, context) =>
        json(200, await backend.getEmployee(context, numericParam(request, 'employeeId')))
    },
    {
      method: 'get',
      path: '/leave-types',
      resourceKind: 'hr.leave.type',
      handle: async (_request, _response, context) => json(200, await backend.listLeaveTypes(context))
    },
    {
      method: 'post',
      path: '/leave',
      resourceKind: 'hr.leave',
      handle: async (request, _response, context) => {
        requireFields(request.body, ['employee_id', 'leave_type_id', 'from_date', 'to_date']);
        const payload = parseInput(leaveSchema, request.body);
        if (payload.to_date < payload.from_date) {
          throw badRequest("The 'to_date' cannot be earlier than the 'from_date'.");
        }

        return json(201, await backend.submitLeave(context, {
          employeeId: payload.employee_id,
          leaveTypeId: payload.leave_type_id,
          fromDate: payload.from_date,
          toDate: payload.to_date,
          note: payload.note ?? null
        }));
      }
    },
    {
      method: 'get',
      path: '/payslips/:employeeId(\\d+)',
      resourceKind: 'hr.payslip',
      handle: async (request, _response, context) =>
        json(200, await backend.listPayslips(context, numericParam(request, 'employeeId')))
    },
    {
      method: 'get',
      path: '/payslip/:payslipId(\\d+)/download',
      resourceKind: 'hr.payslip',
      handle: async (request, _response, context) =>
        file(await backend.getPayslipPdf(context, numericParam(request, 'payslipId')))
    },
    {
      method: 'post',
      path: '/expenses',
      resourceKind: 'hr.expense',
      handle: async (request, response, context) => {
        await runMiddleware(upload.single('receipt'), request, response);
        requireFields(request.body, ['description', 'amount', 'date', 'employee_id']);
        const payload = parseInput(expenseSchema, request.body);

        return json(201, await backend.submitExpense(context, {
          employeeId: payload.employee_id,
          description: payload.description,
          amount: payload.amount,
          date: payload.date,
          receipt: toUpload(request.file)
        }));
      }
    },
    {
      method: 'get',
      path: '/leaves/pending-count/:employeeId(\\d+)',
      resourceKind: 'hr.leave',
      handle: async (request, _response, context) =>
        json(200, await backend.countPendingLeaves(context, numericParam(request, 'employeeId')))
    },
    {
      method: 'get',
      path: '/leaves/next-off/:employeeId(\\d+)',
      resourceKind: 'hr.leave',
      handle: async (request, _response, context) =>
        json(200, await backend.getNextDayOff(context, numericParam(request, 'employeeId')))
    },
    {
      method: 'get',
      path: '/attendance/today/:employeeId(\\d+)',
      resourceKind: 'hr.attendance',
      handle: async (request, _response, context) =>
        json(200, await backend.getTodayAttendance(context, numericParam(request, 'employeeId')))
    },
    {
      method: 'get',
      path: '/attendance/status/:employeeId(\\d+)',
      resourceKind: 'hr.attendance',
      handle: async (request, _response, context) =>
        json(200, await backend.getAttendanceStatus(context, numericParam(request, 'employeeId')))
    },
    {
      method: 'post',
      path: '/attendance/check-in',
      resourceKind: 'hr.attendance',
      handle: async (request, response, context) => {
        await runMiddleware(upload.none(), request, response);
        requireFields({ ...request.query, ...request.body }, ['employee_id']);
        const payload = parseInput(employeeIdFieldSchema, { ...request.query, ...request.body });
        return json(201, await backend.checkIn(context, payload.employee_id));
      }
    },
    {
      method: 'post',
      path: '/attendance/check-out',
      resourceKind: 'hr.attendance',
      handle: async (request, response, context) => {
        await runMiddleware(upload.none(), request, response);
        requireFields({ ...request.query, ...request.body }, ['employee_id']);
        const payload = parseInput(employeeIdFieldSchema, { ...request.query, ...request.body });
        return json(200, await backend.checkOut(context, payload.employee_id));
      }
    },
    {
      method: 'get',
      path: '/admin/employees/search',
      resourceKind: null,
      handle: async (request, _response, context) => {
        const query = parseInput(searchSchema, request.query);
        return json(200, await backend.searchEmployees(context, {
          term: query.term === undefined || query.term.length === 0 ? null : query.term,
          limit: query.limit
        }));
      }
    },
    {
      method: 'post',
      path: '/employee/:employeeId(\\d+)/document',
      resourceKind: 'hr.employee',
      handle: async (request, response, context) => {
        const employeeId = numericParam(request, 'employeeId');
        await runMiddleware(upload.single('file'), request, response);
        requireFields(request.body, ['document_type']);
        const payload = parseInput(documentSchema, request.body);

        const uploaded = toUpload(request.file);
        if (uploaded === null || uploaded.originalName.length === 0) {
          throw badRequest("Missing 'file' in form data.");
        }

        return json(201, await backend.uploadEmployeeDocument(context, employeeId, payload.document_type, uploaded));
      }
    },
    {
      method: 'get',
      path: '/employee/:employeeId(\\d+)/documents',
      resourceKind: 'ir.attachment',
      handle: async (request, _response, context) =>
        json(200, await backend.listEmployeeDocuments(context, numericParam(request, 'employeeId')))
    },
    {
      method: 'get',
      path: '/attachment/:attachmentId(\\d+)/download',
      resourceKind: 'ir.attachment',
      handle: async (request, _response, context) =>
        file(await backend.getAttachment(context, numericParam(request, 'attachmentId')))
    },
    {
      method: 'delete',
      path: '/attachment/:attachmentId(\\d+)',
      resourceKind: 'ir.attachment',
      handle: async (request, _response, context) =>
        json(200, await backend.deleteAttachment(context, numericParam(request, 'attachmentId')))
    }
  ];
}

export function createConnectorRoutes(guard: InboundGuard, backend: HrBackend): Router {
  const router = createRouter();

  router.get('/ping', (_request, response) => {
    response.status(200).json({ status: 'ok', message: 'ESS connector is reachable.' });
  });

  for (const route of buildConnectorRoutes(backend)) {
    router[route.method](route.path, async (request, response, next) => {
      try {
        const result = await guard.run(
          toGuardRequest(request),
          route.resourceKind,
          async (context) => {
            await readBody(request, response);
            return route.handle(request, response, context);
          }
        );
        sendResult(response, result);
      } catch (error) {
        next(error);
      }
    });
  }

  return router;
}
