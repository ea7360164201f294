import express, { type Express } from 'express';
import helmet from 'helmet';

import { getEnv, type Env } from './config/env.js';
import { createConnectorRoutes } from './connector/connector-routes.js';
import type { HrBackend } from './connector/hr-backend.js';
import { InboundGuard } from './connector/inbound-guard.js';
import { createPoolProvider } from './db/pool-provider.js';
import { AppError } from './errors/app-error.js';
import { errorHandler } from './errors/error-handler.js';
import { attachRequestTelemetry } from './http/middlewares/request-telemetry.js';
import { attachTraceId } from './http/middlewares/trace-id.js';
import type { ApiLogRepository } from './repositories/api-log-repository.js';
import { InMemoryApiLogRepository } from './repositories/in-memory-api-log-repository.js';
import { InMemoryServiceTokenRepository } from './repositories/in-memory-service-token-repository.js';
import { PostgresApiLogRepository } from './repositories/postgres-api-log-repository.js';
import { PostgresServiceTokenRepository } from './repositories/postgres-service-token-repository.js';
import type { ServiceTokenRepository } from './repositories/service-token-repository.js';
import { ApiLogService } from './services/api-log-service.js';
import { ServiceTokenService } from './services/service-token-service.js';

export interface CreateConnectorAppOptions {
  backend: HrBackend;
  envOverrides?: Partial<Record<keyof Env, unknown>>;
  serviceTokenRepository?: ServiceTokenRepository;
  apiLogRepository?: ApiLogRepository;
  clock?: () => Date;
}

export interface ConnectorRuntime {
  app: Express;
  env: Env;
  guard: InboundGuard;
  serviceTokens: ServiceTokenService;
  apiLog: ApiLogService;
  close(): Promise<void>;
}

/**
 * Builds the HR-side connector: `/ess/api/*` routes behind the inbound
 * guard, delegating every HR operation to `backend`.
 */
export function createConnectorApp(options: CreateConnectorAppOptions): ConnectorRuntime {
  const env = getEnv(options.envOverrides);
  const app = express();
  const pools = createPoolProvider(env);

  const serviceTokenRepository = options.serviceTokenRepository
    ?? (pools.hasDatabase ? new PostgresServiceTokenRepository(pools.getPool()) : new InMemoryServiceTokenRepository());
  const apiLogRepository = options.apiLogRepository
    ?? (pools.hasDatabase ? new PostgresApiLogRepository(pools.getPool()) : new InMemoryApiLogRepository());

  const serviceTokens = new ServiceTokenService(serviceTokenRepository);
  const apiLog = new ApiLogService(apiLogRepository);
  const guard = new InboundGuard({
    settings: {
      enabled: env.CONNECTOR_ENABLED,
      allowedIps: env.CONNECTOR_ALLOWED_IPS
    },
    serviceTokens,
    apiLog,
    clock: options.clock
  });

  app.disable('x-powered-by');
  if (env.CONNECTOR_TRUST_PROXY) {
    app.set('trust proxy', true);
  }

  app.use(helmet());
  app.use(attachTraceId);
  if (env.NODE_ENV !== 'test') {
    app.use(attachRequestTelemetry);
  }

  app.use('/ess/api', createConnectorRoutes(guard, options.backend));

  app.use((_request, _response, next) => {
    next(new AppError(404, 'NOT_FOUND', 'Route not found.'));
  });

  app.use(errorHandler);

  return {
    app,
    env,
    guard,
    serviceTokens,
    apiLog,
    async close() {
      await pools.close();
    }
  };
}
