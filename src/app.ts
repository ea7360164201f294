import express, { type Express, type Request } from 'express';
import helmet from 'helmet';
import rateLimit, { ipKeyGenerator } from 'express-rate-limit';

import { getEnv, type Env } from './config/env.js';
import { createPoolProvider } from './db/pool-provider.js';
import { DownstreamClient } from './downstream/downstream-client.js';
import { AppError } from './errors/app-error.js';
import { errorHandler } from './errors/error-handler.js';
import { attachRequestTelemetry } from './http/middlewares/request-telemetry.js';
import { createRequireAuth, requireAdmin } from './http/middlewares/require-auth.js';
import { attachTraceId } from './http/middlewares/trace-id.js';
import { createAdminTenantRoutes } from './http/routes/admin-tenant-routes.js';
import { createAdminUserRoutes, createHrEmployeeSearchRoutes } from './http/routes/admin-user-routes.js';
import { createAuthRoutes } from './http/routes/auth-routes.js';
import { createHrRoutes } from './http/routes/hr-routes.js';
import { createUserRoutes } from './http/routes/user-routes.js';
import { InMemoryPrincipalRepository } from './repositories/in-memory-principal-repository.js';
import { InMemoryTenantRepository } from './repositories/in-memory-tenant-repository.js';
import { PostgresPrincipalRepository } from './repositories/postgres-principal-repository.js';
import { PostgresTenantRepository } from './repositories/postgres-tenant-repository.js';
import type { PrincipalRepository } from './repositories/principal-repository.js';
import type { TenantRepository } from './repositories/tenant-repository.js';
import { CredentialVault } from './security/credential-vault.js';
import { AuthService } from './services/auth-service.js';
import { createEmailSender, type EmailSender } from './services/email-sender.js';
import { HrPortalService } from './services/hr-portal-service.js';
import { PrincipalAdminService } from './services/principal-admin-service.js';
import { TenantCredentialStore } from './services/tenant-credential-store.js';
import { TenantService } from './services/tenant-service.js';
import { TokenService } from './services/token-service.js';

export interface CreateAppOptions {
  envOverrides?: Partial<Record<keyof Env, unknown>>;
  principalRepository?: PrincipalRepository;
  tenantRepository?: TenantRepository;
  emailSender?: EmailSender;
  downstreamClient?: DownstreamClient;
}

export interface AppRuntime {
  app: Express;
  env: Env;
  principalRepository: PrincipalRepository;
  tenantRepository: TenantRepository;
  vault: CredentialVault;
  tokenService: TokenService;
  close(): Promise<void>;
}

function requestEmail(request: Request): string {
  const body: unknown = request.body;
  if (typeof body === 'object' && body !== null && 'email' in body && typeof body.email === 'string') {
    return body.email.toLowerCase();
  }

  return 'unknown-email';
}

function createGlobalRateLimiter() {
  return rateLimit({
    windowMs: 60_000,
    limit: 200,
    standardHeaders: 'draft-8',
    legacyHeaders: false,
    keyGenerator: (request) => ipKeyGenerator(request.ip ?? '')
  });
}

function createAuthRateLimiter() {
  return rateLimit({
    windowMs: 15 * 60_000,
    limit: 30,
    standardHeaders: 'draft-8',
    legacyHeaders: false,
    keyGenerator: (request) => `${ipKeyGenerator(request.ip ?? '')}:${requestEmail(request)}`
  });
}

/**
 * Builds the portal gateway. Configuration problems (missing signing secret
 * or vault key) throw `ConfigurationError` here, before anything listens.
 */
export function createApp(options: CreateAppOptions = {}): AppRuntime {
  const env = getEnv(options.envOverrides);
  const app = express();
  const pools = createPoolProvider(env);

  const principalRepository = options.principalRepository
    ?? (pools.hasDatabase ? new PostgresPrincipalRepository(pools.getPool()) : new InMemoryPrincipalRepository());
  const tenantRepository = options.tenantRepository
    ?? (pools.hasDatabase ? new PostgresTenantRepository(pools.getPool()) : new InMemoryTenantRepository());

  const vault = CredentialVault.fromConfig(env.CREDENTIAL_ENCRYPTION_KEY);
  const tokenService = new TokenService({
    secret: env.JWT_SECRET,
    algorithm: env.JWT_ALGORITHM,
    accessTokenTtlSeconds: env.ACCESS_TOKEN_TTL_MINUTES * 60,
    refreshTokenTtlSeconds: env.REFRESH_TOKEN_TTL_DAYS * 24 * 60 * 60
  });
  const downstreamClient = options.downstreamClient ?? new DownstreamClient({ timeoutMs: env.DOWNSTREAM_TIMEOUT_MS });
  const credentialStore = new TenantCredentialStore(tenantRepository, vault);

  const authService = new AuthService(
    principalRepository,
    tenantRepository,
    tokenService,
    options.emailSender ?? createEmailSender(env),
    {
      lockoutAttempts: env.AUTH_LOCKOUT_ATTEMPTS,
      lockoutSeconds: env.AUTH_LOCKOUT_SECONDS,
      resetTokenTtlMinutes: env.AUTH_RESET_TOKEN_TTL_MINUTES,
      portalBaseUrl: env.PORTAL_BASE_URL
    }
  );
  const tenantService = new TenantService(tenantRepository, principalRepository, credentialStore, downstreamClient);
  const principalAdminService = new PrincipalAdminService(principalRepository, tenantRepository);
  const hrPortalService = new HrPortalService(principalRepository, tenantRepository, credentialStore, downstreamClient);

  const requireAuth = createRequireAuth(authService);

  app.disable('x-powered-by');
  app.use(helmet());
  app.use(express.json());
  app.use(express.urlencoded({ extended: false }));
  app.use(attachTraceId);
  if (env.NODE_ENV !== 'test') {
    app.use(attachRequestTelemetry);
  }

  app.use(createGlobalRateLimiter());

  app.use('/v1/auth/login', createAuthRateLimiter());
  app.use('/v1/auth/password', createAuthRateLimiter());
  app.use('/v1/auth', createAuthRoutes(authService));
  app.use('/v1/users', requireAuth, createUserRoutes(hrPortalService));
  app.use('/v1/hr', requireAuth, createHrRoutes(hrPortalService));
  app.use('/v1/admin', requireAuth, requireAdmin);
  app.use('/v1/admin/tenants', createAdminTenantRoutes(tenantService, credentialStore));
  app.use('/v1/admin/users', createAdminUserRoutes(principalAdminService));
  app.use('/v1/admin/hr-employees', createHrEmployeeSearchRoutes(hrPortalService));

  app.get('/health', (_request, response) => {
    response.status(200).json({
      status: 'ok'
    });
  });

  app.use((_request, _response, next) => {
    next(new AppError(404, 'NOT_FOUND', 'Route not found.'));
  });

  app.use(errorHandler);

  return {
    app,
    env,
    principalRepository,
    tenantRepository,
    vault,
    tokenService,
    async close() {
      await pools.close();
    }
  };
}
