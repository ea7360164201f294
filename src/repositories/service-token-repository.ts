import type { ResourceKind } from '../auth/auth-context.js';

/** Downstream identity a service token acts as. */
export interface ConnectorAccount {
  id: string;
  login: string;
  name: string;
  isActive: boolean;
  createdAt: Date;
}

export interface ServiceTokenRecord {
  id: string;
  label: string;
  accountId: string;
  tokenPrefix: string;
  scope: ResourceKind[];
  isActive: boolean;
  lastUsedAt: Date | null;
  note: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ServiceTokenAuthRecord {
  serviceToken: ServiceTokenRecord;
  account: ConnectorAccount;
}

export interface CreateConnectorAccountInput {
  login: string;
  name: string;
  isActive?: boolean;
}

export interface CreateServiceTokenInput {
  label: string;
  accountId: string;
  tokenHash: string;
  tokenPrefix: string;
  scope: ResourceKind[];
  note?: string | null;
}

/** Mutable token settings. The token value itself only changes through rotation. */
export interface ServiceTokenChanges {
  label?: string;
  scope?: ResourceKind[];
  isActive?: boolean;
  note?: string | null;
}

export interface RotateServiceTokenInput {
  serviceTokenId: string;
  tokenHash: string;
  tokenPrefix: string;
}

export interface ServiceTokenRepository {
  createAccount(input: CreateConnectorAccountInput): Promise<ConnectorAccount>;
  findAccountById(accountId: string): Promise<ConnectorAccount | null>;
  setAccountActive(accountId: string, isActive: boolean): Promise<ConnectorAccount | null>;

  createServiceToken(input: CreateServiceTokenInput): Promise<ServiceTokenRecord>;
  listServiceTokens(): Promise<ServiceTokenRecord[]>;
  findServiceTokenById(serviceTokenId: string): Promise<ServiceTokenRecord | null>;
  updateServiceToken(serviceTokenId: string, changes: ServiceTokenChanges): Promise<ServiceTokenRecord | null>;
  rotateServiceToken(input: RotateServiceTokenInput): Promise<ServiceTokenRecord | null>;
  /** Resolves only when both the token and its account are active. */
  findActiveServiceTokenByHash(tokenHash: string): Promise<ServiceTokenAuthRecord | null>;
  markServiceTokenUsed(serviceTokenId: string, usedAt: Date): Promise<void>;
}
