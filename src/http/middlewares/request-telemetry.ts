import { performance } from 'node:perf_hooks';

import { SpanStatusCode, trace } from '@opentelemetry/api';
import type { NextFunction, Request, Response } from 'express';

import { recordHttpError, recordHttpRequest } from '../../telemetry/metrics.js';

const tracer = trace.getTracer('hr-portal-gateway');

/**
 * Route template of the matched handler (`/v1/hr/payslips/:id/download`), so
 * metrics are not split per id. Unmatched requests share one bucket.
 */
export function routeTemplate(request: Request): string {
  const route: unknown = request.route;
  if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
    return `${request.baseUrl}${route.path}`;
  }
  return 'unmatched';
}

export function attachRequestTelemetry(request: Request, response: Response, next: NextFunction): void {
  const startTime = performance.now();
  const span = tracer.startSpan('http.request', {
    attributes: { 'http.method': request.method }
  });

  // 'close' also fires when the client hangs up mid-stream, where 'finish' never does.
  response.once('close', () => {
    const durationMs = performance.now() - startTime;
    const route = routeTemplate(request);
    const aborted = !response.writableFinished;
    const tenantId = request.authContext?.tenantId ?? null;

    const attributes: Record<string, string | number> = {
      method: request.method,
      route,
      status_code: response.statusCode,
      outcome: aborted ? 'aborted' : 'completed'
    };

    recordHttpRequest(attributes, durationMs);
    if (response.statusCode >= 500) {
      recordHttpError(attributes);
      span.setStatus({ code: SpanStatusCode.ERROR });
    } else if (aborted) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: 'client closed the connection' });
    } else {
      span.setStatus({ code: SpanStatusCode.OK });
    }

    const traceId = typeof response.locals.traceId === 'string' ? response.locals.traceId : 'unknown-trace';
    span.setAttributes({
      'http.route': route,
      'http.status_code': response.statusCode,
      'http.duration_ms': durationMs,
      'gateway.trace_id': traceId,
      ...(tenantId === null ? {} : { 'gateway.tenant_id': tenantId })
    });
    span.end();

    console.log('http_request', {
      traceId,
      method: request.method,
      route,
      path: request.originalUrl.split('?')[0],
      statusCode: response.statusCode,
      durationMs: Number(durationMs.toFixed(2)),
      aborted,
      tenantId,
      principalId: request.authContext?.principalId ?? null
    });
  });

  next();
}
