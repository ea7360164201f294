import { metrics } from '@opentelemetry/api';

const meter = metrics.getMeter('hr-portal-gateway');

const httpRequestDuration = meter.createHistogram('http.server.request.duration', {
  description: 'Duration of inbound HTTP requests',
  unit: 'ms'
});

const httpRequestCount = meter.createCounter('http.server.request.count', {
  description: 'Count of inbound HTTP requests'
});

const httpErrorCount = meter.createCounter('http.server.request.errors', {
  description: 'Count of HTTP 5xx responses'
});

const downstreamRequestDuration = meter.createHistogram('downstream.client.request.duration', {
  description: 'Duration of calls to tenant HR backends',
  unit: 'ms'
});

const downstreamErrorCount = meter.createCounter('downstream.client.request.errors', {
  description: 'Count of failed calls to tenant HR backends'
});

const connectorCallCount = meter.createCounter('connector.call.count', {
  description: 'Count of guarded connector calls by outcome'
});

export function recordHttpRequest(attributes: Record<string, string | number>, durationMs: number): void {
  httpRequestDuration.record(durationMs, attributes);
  httpRequestCount.add(1, attributes);
}

export function recordHttpError(attributes: Record<string, string | number>): void {
  httpErrorCount.add(1, attributes);
}

export function recordDownstreamRequest(attributes: Record<string, string | number>, durationMs: number): void {
  downstreamRequestDuration.record(durationMs, attributes);
}

export function recordDownstreamError(attributes: Record<string, string | number>): void {
  downstreamErrorCount.add(1, attributes);
}

export function recordConnectorCall(attributes: Record<string, string | number>): void {
  connectorCallCount.add(1, attributes);
}
