import { createHash, randomBytes } from 'node:crypto';

import { isResourceKind, type ResourceKind } from '../auth/auth-context.js';
import { AppError } from '../errors/app-error.js';
import type {
  ConnectorAccount,
  ServiceTokenAuthRecord,
  ServiceTokenRecord,
  ServiceTokenRepository
} from '../repositories/service-token-repository.js';

const TOKEN_PREFIX_LENGTH = 6;

export interface CreateServiceTokenRequest {
  label: string;
  accountId: string;
  scope?: readonly string[];
  note?: string | null;
}

/** The plaintext token is only available in this result; the store keeps its hash. */
export interface IssuedServiceToken {
  serviceToken: ServiceTokenRecord;
  token: string;
}

export function hashServiceToken(token: string): string {
  return createHash('sha256').update(token).digest('hex');
}

function generateToken(): { token: string; tokenHash: string; tokenPrefix: string } {
  const token = randomBytes(32).toString('base64url');
  return {
    token,
    tokenHash: hashServiceToken(token),
    tokenPrefix: token.slice(0, TOKEN_PREFIX_LENGTH)
  };
}

export function parseScope(scope: readonly string[]): ResourceKind[] {
  const kinds: ResourceKind[] = [];

  for (const raw of scope) {
    const value = raw.trim();
    if (value.length === 0) {
      continue;
    }

    if (!isResourceKind(value)) {
      throw new AppError(400, 'SERVICE_TOKEN_SCOPE_INVALID', `Unknown resource kind in scope: ${value}`);
    }

    if (!kinds.includes(value)) {
      kinds.push(value);
    }
  }

  return kinds;
}

export class ServiceTokenService {
  public constructor(private readonly repository: ServiceTokenRepository) {}

  public async createAccount(login: string, name: string): Promise<ConnectorAccount> {
    if (login.trim().length === 0 || name.trim().length === 0) {
      throw new AppError(400, 'CONNECTOR_ACCOUNT_INVALID', 'Account login and name are required.');
    }

    return this.repository.createAccount({ login, name });
  }

  public async setAccountActive(accountId: string, isActive: boolean): Promise<ConnectorAccount> {
    const account = await this.repository.setAccountActive(accountId, isActive);
    if (account === null) {
      throw new AppError(404, 'CONNECTOR_ACCOUNT_NOT_FOUND', 'Connector account not found.');
    }

    return account;
  }

  public async createServiceToken(request: CreateServiceTokenRequest): Promise<IssuedServiceToken> {
    const label = request.label.trim();
    if (label.length === 0) {
      throw new AppError(400, 'SERVICE_TOKEN_LABEL_INVALID', 'Service token label is required.');
    }

    const account = await this.repository.findAccountById(request.accountId);
    if (account === null) {
      throw new AppError(404, 'CONNECTOR_ACCOUNT_NOT_FOUND', 'Connector account not found.');
    }

    const scope = parseScope(request.scope ?? []);
    const generated = generateToken();
    const serviceToken = await this.repository.createServiceToken({
      label,
      accountId: account.id,
      tokenHash: generated.tokenHash,
      tokenPrefix: generated.tokenPrefix,
      scope,
      note: request.note ?? null
    });

    console.log('service_token_created', {
      serviceTokenId: serviceToken.id,
      accountId: account.id,
      tokenPrefix: serviceToken.tokenPrefix
    });

    return { serviceToken, token: generated.token };
  }

  public async listServiceTokens(): Promise<ServiceTokenRecord[]> {
    return this.repository.listServiceTokens();
  }

  public async rotateServiceToken(serviceTokenId: string): Promise<IssuedServiceToken> {
    const generated = generateToken();
    const serviceToken = await this.repository.rotateServiceToken({
      serviceTokenId,
      tokenHash: generated.tokenHash,
      tokenPrefix: generated.tokenPrefix
    });

    if (serviceToken === null) {
      throw new AppError(404, 'SERVICE_TOKEN_NOT_FOUND', 'Service token not found.');
    }

    console.log('service_token_rotated', { serviceTokenId, tokenPrefix: serviceToken.tokenPrefix });
    return { serviceToken, token: generated.token };
  }

  public async toggleActive(serviceTokenId: string): Promise<ServiceTokenRecord> {
    const current = await this.requireServiceToken(serviceTokenId);
    return this.update(serviceTokenId, { isActive: !current.isActive });
  }

  public async setScope(serviceTokenId: string, scope: readonly string[]): Promise<ServiceTokenRecord> {
    return this.update(serviceTokenId, { scope: parseScope(scope) });
  }

  public async updateDetails(serviceTokenId: string, details: { label?: string; note?: string | null }): Promise<ServiceTokenRecord> {
    if (details.label !== undefined && details.label.trim().length === 0) {
      throw new AppError(400, 'SERVICE_TOKEN_LABEL_INVALID', 'Service token label is required.');
    }

    return this.update(serviceTokenId, {
      label: details.label?.trim(),
      note: details.note
    });
  }

  /** Active token of an active account, or `null`. */
  public async authenticate(token: string): Promise<ServiceTokenAuthRecord | null> {
    if (token.length === 0) {
      return null;
    }

    return this.repository.findActiveServiceTokenByHash(hashServiceToken(token));
  }

  /** Last-used bookkeeping never fails the call that triggered it. */
  public async markUsedSafely(serviceTokenId: string, usedAt: Date): Promise<void> {
    try {
      await this.repository.markServiceTokenUsed(serviceTokenId, usedAt);
    } catch (error) {
      console.warn('service_token_mark_used_failed', {
        serviceTokenId,
        error: error instanceof Error ? error.message : 'unknown'
      });
    }
  }

  private async update(
    serviceTokenId: string,
    changes: { label?: string; scope?: ResourceKind[]; isActive?: boolean; note?: string | null }
  ): Promise<ServiceTokenRecord> {
    const updated = await this.repository.updateServiceToken(serviceTokenId, changes);
    if (updated === null) {
      throw new AppError(404, 'SERVICE_TOKEN_NOT_FOUND', 'Service token not found.');
    }

    return updated;
  }

  private async requireServiceToken(serviceTokenId: string): Promise<ServiceTokenRecord> {
    const serviceToken = await this.repository.findServiceTokenById(serviceTokenId);
    if (serviceToken === null) {
      throw new AppError(404, 'SERVICE_TOKEN_NOT_FOUND', 'Service token not found.');
    }

    return serviceToken;
  }
}
