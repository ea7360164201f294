import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'node:crypto';

const TRACE_ID_PATTERN = /^[A-Za-z0-9-]{8,64}$/;

/** Reuses a well-formed inbound `x-trace-id` from the caller or a proxy; otherwise mints one. */
export function attachTraceId(request: Request, response: Response, next: NextFunction): void {
  const inbound = request.header('x-trace-id');
  const traceId = inbound !== undefined && TRACE_ID_PATTERN.test(inbound) ? inbound : randomUUID();

  response.locals.traceId = traceId;
  response.setHeader('x-trace-id', traceId);
  next();
}
