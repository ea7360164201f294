import { diag, DiagConsoleLogger, DiagLogLevel } from '@opentelemetry/api';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { NodeSDK } from '@opentelemetry/sdk-node';
import { ConsoleMetricExporter, PeriodicExportingMetricReader } from '@opentelemetry/sdk-metrics';
import { ConsoleSpanExporter } from '@opentelemetry/sdk-trace-base';

import type { Env } from '../config/env.js';

const UNTRACED_PATHS = new Set(['/health', '/ess/api/ping']);

let sdk: NodeSDK | null = null;

/**
 * Starts tracing and metrics for the process. Liveness probes are left out of
 * the HTTP spans; the pg and http instrumentations cover database and
 * downstream calls.
 */
export async function startTelemetry(env: Env, serviceName: string = env.OTEL_SERVICE_NAME): Promise<void> {
  if (!env.OTEL_ENABLED || env.NODE_ENV === 'test' || sdk !== null) {
    return;
  }

  diag.setLogger(new DiagConsoleLogger(), DiagLogLevel.ERROR);

  sdk = new NodeSDK({
    serviceName,
    traceExporter: new ConsoleSpanExporter(),
    metricReader: new PeriodicExportingMetricReader({
      exporter: new ConsoleMetricExporter(),
      exportIntervalMillis: env.OTEL_METRIC_EXPORT_INTERVAL_MS
    }),
    instrumentations: [
      getNodeAutoInstrumentations({
        '@opentelemetry/instrumentation-fs': { enabled: false },
        '@opentelemetry/instrumentation-http': {
          ignoreIncomingRequestHook: (request) => UNTRACED_PATHS.has((request.url ?? '').split('?')[0] ?? '')
        }
      })
    ]
  });

  await Promise.resolve(sdk.start());
  console.log('telemetry_started', { serviceName });
}

export async function stopTelemetry(): Promise<void> {
  if (sdk === null) {
    return;
  }

  await sdk.shutdown();
  sdk = null;
}
