import { performance } from 'node:perf_hooks';

import { scopePermits, type ResourceKind } from '../auth/auth-context.js';
import { AppError } from '../errors/app-error.js';
import type { ConnectorAccount, ServiceTokenRecord } from '../repositories/service-token-repository.js';
import type { ApiLogService } from '../services/api-log-service.js';
import type { ServiceTokenService } from '../services/service-token-service.js';
import { recordConnectorCall } from '../telemetry/metrics.js';

export interface ConnectorSettings {
  enabled: boolean;
  allowedIps: readonly string[];
}

export interface GuardRequest {
  method: string;
  endpoint: string;
  ip: string | null;
  authorization: string | undefined;
}

export interface ConnectorCallContext {
  account: ConnectorAccount;
  serviceToken: ServiceTokenRecord;
}

export type HandlerResult =
  | { kind: 'json'; status: number; body: unknown }
  | { kind: 'file'; status: number; filename: string; contentType: string; content: Buffer };

export type GuardedHandler = (context: ConnectorCallContext) => Promise<HandlerResult>;

export type StageOutcome =
  | { action: 'continue' }
  | { action: 'reject'; status: number; error: string; message: string; logMessage: string };

/** Mutable per-call state threaded through the stages. */
export interface GuardState {
  readonly request: GuardRequest;
  readonly resourceKind: ResourceKind | null;
  bearerToken: string | null;
  context: ConnectorCallContext | null;
}

export interface GuardStage {
  name: string;
  run(state: GuardState): Promise<StageOutcome>;
}

const CONTINUE: StageOutcome = { action: 'continue' };

function reject(status: number, error: string, message: string, logMessage: string): StageOutcome {
  return { action: 'reject', status, error, message, logMessage };
}

/** Strips the IPv4-mapped IPv6 prefix so `::ffff:10.0.0.1` matches `10.0.0.1`. */
export function normalizeIp(ip: string): string {
  const trimmed = ip.trim();
  return trimmed.toLowerCase().startsWith('::ffff:') && trimmed.includes('.') ? trimmed.slice(7) : trimmed;
}

export function parseBearerToken(header: string | undefined): string | null {
  if (header === undefined || !header.startsWith('Bearer ')) {
    return null;
  }

  const token = header.slice('Bearer '.length).trim();
  return token.length > 0 ? token : null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Log line for a completed handler: `Success: ...` or `Error: ...` using the
 * body's message, error_description or error field when there is one.
 */
export function describeResult(result: HandlerResult): string {
  const prefix = result.status < 400 ? 'Success' : 'Error';

  if (result.kind === 'file') {
    return `${prefix} (Status: ${result.status}, Content-Type: ${result.contentType})`;
  }

  if (isRecord(result.body)) {
    for (const key of ['message', 'error_description', 'error']) {
      const value = result.body[key];
      if (typeof value === 'string' && value.length > 0) {
        return `${prefix}: ${value}`;
      }
    }
  }

  const serialized = JSON.stringify(result.body) ?? '';
  return `${prefix}: ${serialized.slice(0, 100)}`;
}

export function killSwitchStage(settings: ConnectorSettings): GuardStage {
  return {
    name: 'kill_switch',
    run: () => Promise.resolve(
      settings.enabled
        ? CONTINUE
        : reject(503, 'Service Unavailable', 'ESS API disabled.', 'Service Unavailable: ESS API disabled.')
    )
  };
}

export function ipAllowListStage(settings: ConnectorSettings): GuardStage {
  const allowed = new Set(settings.allowedIps.map(normalizeIp));

  return {
    name: 'ip_allow_list',
    run: (state) => {
      if (allowed.size === 0) {
        return Promise.resolve(CONTINUE);
      }

      const ip = state.request.ip === null ? null : normalizeIp(state.request.ip);
      if (ip !== null && allowed.has(ip)) {
        return Promise.resolve(CONTINUE);
      }

      const shown = ip ?? 'unknown';
      return Promise.resolve(
        reject(403, 'Forbidden', `IP ${shown} not allowed.`, `Forbidden: IP ${shown} not allowed.`)
      );
    }
  };
}

export function bearerPresenceStage(): GuardStage {
  return {
    name: 'bearer_presence',
    run: (state) => {
      state.bearerToken = parseBearerToken(state.request.authorization);
      return Promise.resolve(
        state.bearerToken === null
          ? reject(401, 'Unauthorized', 'Missing Bearer token.', 'Unauthorized: Missing Bearer token.')
          : CONTINUE
      );
    }
  };
}

export function tokenValidationStage(serviceTokens: ServiceTokenService, clock: () => Date): GuardStage {
  return {
    name: 'token_validation',
    run: async (state) => {
      const record = state.bearerToken === null ? null : await serviceTokens.authenticate(state.bearerToken);
      if (record === null) {
        console.warn('connector_token_rejected', {
          endpoint: state.request.endpoint,
          tokenPrefix: state.bearerToken?.slice(0, 6) ?? null
        });
        return reject(
          401,
          'Unauthorized',
          'Invalid or inactive API token.',
          'Unauthorized: Invalid or inactive API token.'
        );
      }

      state.context = { account: record.account, serviceToken: record.serviceToken };
      await serviceTokens.markUsedSafely(record.serviceToken.id, clock());
      return CONTINUE;
    }
  };
}

export function scopeStage(): GuardStage {
  return {
    name: 'scope',
    run: (state) => {
      const scope = state.context?.serviceToken.scope ?? [];
      if (scopePermits(scope, state.resourceKind)) {
        return Promise.resolve(CONTINUE);
      }

      const kind = state.resourceKind ?? 'unknown';
      return Promise.resolve(
        reject(
          403,
          'Forbidden',
          `Token does not have scope for '${kind}'.`,
          `Forbidden: Token scope does not grant access to '${kind}'.`
        )
      );
    }
  };
}

export interface InboundGuardOptions {
  settings: ConnectorSettings;
  serviceTokens: ServiceTokenService;
  apiLog: ApiLogService;
  clock?: () => Date;
}

/**
 * Authorization pipeline for connector calls: kill switch, IP allow-list,
 * bearer presence, token validation and scope, then the handler. Every call
 * ends in exactly one API log entry, whichever stage decided it.
 */
export class InboundGuard {
  private readonly stages: readonly GuardStage[];

  private readonly apiLog: ApiLogService;

  public constructor(options: InboundGuardOptions) {
    const clock = options.clock ?? (() => new Date());
    this.apiLog = options.apiLog;
    this.stages = [
      killSwitchStage(options.settings),
      ipAllowListStage(options.settings),
      bearerPresenceStage(),
      tokenValidationStage(options.serviceTokens, clock),
      scopeStage()
    ];
  }

  public get stageNames(): string[] {
    return this.stages.map((stage) => stage.name);
  }

  public async run(request: GuardRequest, resourceKind: ResourceKind | null, handler: GuardedHandler): Promise<HandlerResult> {
    const startedAt = performance.now();
    const state: GuardState = { request, resourceKind, bearerToken: null, context: null };

    let result: HandlerResult = {
      kind: 'json',
      status: 500,
      body: { error: 'Internal Server Error', message: 'An error occurred processing your request.' }
    };
    let logMessage = 'Processing...';
    let decidedBy = 'handler';

    try {
      const rejection = await this.runStages(state);

      if (rejection !== null) {
        decidedBy = rejection.stage;
        result = {
          kind: 'json',
          status: rejection.outcome.status,
          body: { error: rejection.outcome.error, message: rejection.outcome.message }
        };
        logMessage = rejection.outcome.logMessage;
        return result;
      }

      const context = state.context;
      if (context === null) {
        logMessage = 'Internal Server Error: caller context missing after authorization.';
        return result;
      }

      try {
        result = await handler(context);
        logMessage = describeResult(result);
      } catch (error) {
        if (error instanceof AppError) {
          result = { kind: 'json', status: error.statusCode, body: { error: error.code, message: error.message } };
          logMessage = `Error: ${error.message}`;
        } else {
          console.error('connector_handler_failed', {
            endpoint: request.endpoint,
            accountId: context.account.id,
            error: error instanceof Error ? error.stack ?? error.message : String(error)
          });
          logMessage = `Internal Server Error in controller: ${error instanceof Error ? error.message : String(error)}`;
        }
      }

      return result;
    } finally {
      recordConnectorCall({ decided_by: decidedBy, status_code: result.status });
      await this.apiLog.recordSafely({
        accountId: state.context?.account.id ?? null,
        serviceTokenId: state.context?.serviceToken.id ?? null,
        endpoint: request.endpoint,
        method: request.method,
        requestIp: request.ip,
        responseStatusCode: result.status,
        message: logMessage,
        durationMs: performance.now() - startedAt
      });
    }
  }

  private async runStages(state: GuardState): Promise<{ stage: string; outcome: Extract<StageOutcome, { action: 'reject' }> } | null> {
    for (const stage of this.stages) {
      let outcome: StageOutcome;

      try {
        outcome = await stage.run(state);
      } catch (error) {
        console.error('connector_stage_failed', {
          stage: stage.name,
          endpoint: state.request.endpoint,
          error: error instanceof Error ? error.message : String(error)
        });
        outcome = reject(
          500,
          'Internal Server Error',
          'Error processing integration settings.',
          `Internal Error: ${stage.name} check failed.`
        );
      }

      if (outcome.action === 'reject') {
        console.warn('connector_call_rejected', {
          stage: stage.name,
          endpoint: state.request.endpoint,
          statusCode: outcome.status
        });
        return { stage: stage.name, outcome };
      }
    }

    return null;
  }
}
