import { randomUUID } from 'node:crypto';

import { AppError } from '../errors/app-error.js';
import type {
  ConnectorAccount,
  CreateConnectorAccountInput,
  CreateServiceTokenInput,
  RotateServiceTokenInput,
  ServiceTokenAuthRecord,
  ServiceTokenChanges,
  ServiceTokenRecord,
  ServiceTokenRepository
} from './service-token-repository.js';

interface StoredServiceToken extends ServiceTokenRecord {
  tokenHash: string;
}

function cloneAccount(account: ConnectorAccount): ConnectorAccount {
  return {
    ...account,
    createdAt: new Date(account.createdAt)
  };
}

function cloneServiceToken(stored: StoredServiceToken): ServiceTokenRecord {
  return {
    id: stored.id,
    label: stored.label,
    accountId: stored.accountId,
    tokenPrefix: stored.tokenPrefix,
    scope: [...stored.scope],
    isActive: stored.isActive,
    lastUsedAt: stored.lastUsedAt === null ? null : new Date(stored.lastUsedAt),
    note: stored.note,
    createdAt: new Date(stored.createdAt),
    updatedAt: new Date(stored.updatedAt)
  };
}

export class InMemoryServiceTokenRepository implements ServiceTokenRepository {
  private readonly accountsById = new Map<string, ConnectorAccount>();

  private readonly serviceTokensById = new Map<string, StoredServiceToken>();

  private readonly serviceTokenIdsByHash = new Map<string, string>();

  public createAccount(input: CreateConnectorAccountInput): Promise<ConnectorAccount> {
    const login = input.login.trim().toLowerCase();
    for (const account of this.accountsById.values()) {
      if (account.login === login) {
        return Promise.reject(new AppError(409, 'CONNECTOR_ACCOUNT_LOGIN_IN_USE', 'Account login is already taken.'));
      }
    }

    const account: ConnectorAccount = {
      id: randomUUID(),
      login,
      name: input.name.trim(),
      isActive: input.isActive ?? true,
      createdAt: new Date()
    };

    this.accountsById.set(account.id, account);
    return Promise.resolve(cloneAccount(account));
  }

  public findAccountById(accountId: string): Promise<ConnectorAccount | null> {
    const account = this.accountsById.get(accountId);
    return Promise.resolve(account === undefined ? null : cloneAccount(account));
  }

  public setAccountActive(accountId: string, isActive: boolean): Promise<ConnectorAccount | null> {
    const account = this.accountsById.get(accountId);
    if (account === undefined) {
      return Promise.resolve(null);
    }

    account.isActive = isActive;
    return Promise.resolve(cloneAccount(account));
  }

  public createServiceToken(input: CreateServiceTokenInput): Promise<ServiceTokenRecord> {
    const now = new Date();
    const stored: StoredServiceToken = {
      id: randomUUID(),
      label: input.label,
      accountId: input.accountId,
      tokenHash: input.tokenHash,
      tokenPrefix: input.tokenPrefix,
      scope: [...input.scope],
      isActive: true,
      lastUsedAt: null,
      note: input.note ?? null,
      createdAt: now,
      updatedAt: now
    };

    this.serviceTokensById.set(stored.id, stored);
    this.serviceTokenIdsByHash.set(stored.tokenHash, stored.id);
    return Promise.resolve(cloneServiceToken(stored));
  }

  public listServiceTokens(): Promise<ServiceTokenRecord[]> {
    const tokens = Array.from(this.serviceTokensById.values())
      .sort((left, right) => right.createdAt.getTime() - left.createdAt.getTime())
      .map(cloneServiceToken);

    return Promise.resolve(tokens);
  }

  public findServiceTokenById(serviceTokenId: string): Promise<ServiceTokenRecord | null> {
    const stored = this.serviceTokensById.get(serviceTokenId);
    return Promise.resolve(stored === undefined ? null : cloneServiceToken(stored));
  }

  public updateServiceToken(serviceTokenId: string, changes: ServiceTokenChanges): Promise<ServiceTokenRecord | null> {
    const stored = this.serviceTokensById.get(serviceTokenId);
    if (stored === undefined) {
      return Promise.resolve(null);
    }

    if (changes.label !== undefined) {
      stored.label = changes.label;
    }

    if (changes.scope !== undefined) {
      stored.scope = [...changes.scope];
    }

    if (changes.isActive !== undefined) {
      stored.isActive = changes.isActive;
    }

    if (changes.note !== undefined) {
      stored.note = changes.note;
    }

    stored.updatedAt = new Date();
    return Promise.resolve(cloneServiceToken(stored));
  }

  public rotateServiceToken(input: RotateServiceTokenInput): Promise<ServiceTokenRecord | null> {
    const stored = this.serviceTokensById.get(input.serviceTokenId);
    if (stored === undefined) {
      return Promise.resolve(null);
    }

    this.serviceTokenIdsByHash.delete(stored.tokenHash);
    stored.tokenHash = input.tokenHash;
    stored.tokenPrefix = input.tokenPrefix;
    stored.updatedAt = new Date();
    this.serviceTokenIdsByHash.set(stored.tokenHash, stored.id);
    return Promise.resolve(cloneServiceToken(stored));
  }

  public findActiveServiceTokenByHash(tokenHash: string): Promise<ServiceTokenAuthRecord | null> {
    const serviceTokenId = this.serviceTokenIdsByHash.get(tokenHash);
    if (serviceTokenId === undefined) {
      return Promise.resolve(null);
    }

    const stored = this.serviceTokensById.get(serviceTokenId);
    if (stored === undefined || !stored.isActive) {
      return Promise.resolve(null);
    }

    const account = this.accountsById.get(stored.accountId);
    if (account === undefined || !account.isActive) {
      return Promise.resolve(null);
    }

    return Promise.resolve({
      serviceToken: cloneServiceToken(stored),
      account: cloneAccount(account)
    });
  }

  public markServiceTokenUsed(serviceTokenId: string, usedAt: Date): Promise<void> {
    const stored = this.serviceTokensById.get(serviceTokenId);
    if (stored !== undefined) {
      stored.lastUsedAt = new Date(usedAt);
    }

    return Promise.resolve();
  }
}
