import { randomUUID } from 'node:crypto';

import type { Pool } from 'pg';

import { isResourceKind, type ResourceKind } from '../auth/auth-context.js';
import { isUniqueViolation } from '../db/pg-errors.js';
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

interface ConnectorAccountRow {
  id: string;
  login: string;
  name: string;
  is_active: boolean;
  created_at: Date;
}

interface ServiceTokenRow {
  id: string;
  label: string;
  account_id: string;
  token_prefix: string;
  scope: string[];
  is_active: boolean;
  last_used_at: Date | null;
  note: string | null;
  created_at: Date;
  updated_at: Date;
}

interface ServiceTokenAuthRow extends ServiceTokenRow {
  account_login: string;
  account_name: string;
  account_is_active: boolean;
  account_created_at: Date;
}

function mapAccount(row: ConnectorAccountRow): ConnectorAccount {
  return {
    id: row.id,
    login: row.login,
    name: row.name,
    isActive: row.is_active,
    createdAt: row.created_at
  };
}

function mapScope(values: string[]): ResourceKind[] {
  return values.filter(isResourceKind);
}

function mapServiceToken(row: ServiceTokenRow): ServiceTokenRecord {
  return {
    id: row.id,
    label: row.label,
    accountId: row.account_id,
    tokenPrefix: row.token_prefix,
    scope: mapScope(row.scope),
    isActive: row.is_active,
    lastUsedAt: row.last_used_at,
    note: row.note,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function getSingleRow<T>(rows: T[]): T | null {
  const [row] = rows;
  return row ?? null;
}

export class PostgresServiceTokenRepository implements ServiceTokenRepository {
  public constructor(private readonly pool: Pool) {}

  public async createAccount(input: CreateConnectorAccountInput): Promise<ConnectorAccount> {
    try {
      const result = await this.pool.query<ConnectorAccountRow>(
        `
        INSERT INTO connector_accounts (id, login, name, is_active, created_at)
        VALUES ($1, $2, $3, $4, NOW())
        RETURNING *
        `,
        [randomUUID(), input.login.trim().toLowerCase(), input.name.trim(), input.isActive ?? true]
      );

      const row = getSingleRow(result.rows);
      if (row === null) {
        throw new Error('Failed to create connector account row.');
      }

      return mapAccount(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new AppError(409, 'CONNECTOR_ACCOUNT_LOGIN_IN_USE', 'Account login is already taken.');
      }

      throw error;
    }
  }

  public async findAccountById(accountId: string): Promise<ConnectorAccount | null> {
    const result = await this.pool.query<ConnectorAccountRow>(
      'SELECT * FROM connector_accounts WHERE id = $1 LIMIT 1',
      [accountId]
    );
    const row = getSingleRow(result.rows);
    return row === null ? null : mapAccount(row);
  }

  public async setAccountActive(accountId: string, isActive: boolean): Promise<ConnectorAccount | null> {
    const result = await this.pool.query<ConnectorAccountRow>(
      'UPDATE connector_accounts SET is_active = $2 WHERE id = $1 RETURNING *',
      [accountId, isActive]
    );
    const row = getSingleRow(result.rows);
    return row === null ? null : mapAccount(row);
  }

  public async createServiceToken(input: CreateServiceTokenInput): Promise<ServiceTokenRecord> {
    const result = await this.pool.query<ServiceTokenRow>(
      `
      INSERT INTO service_tokens (
        id,
        label,
        account_id,
        token_hash,
        token_prefix,
        scope,
        is_active,
        last_used_at,
        note,
        created_at,
        updated_at
      )
      VALUES ($1, $2, $3, $4, $5, $6::text[], TRUE, NULL, $7, NOW(), NOW())
      RETURNING id, label, account_id, token_prefix, scope, is_active, last_used_at, note, created_at, updated_at
      `,
      [randomUUID(), input.label, input.accountId, input.tokenHash, input.tokenPrefix, input.scope, input.note ?? null]
    );

    const row = getSingleRow(result.rows);
    if (row === null) {
      throw new Error('Failed to create service token row.');
    }

    return mapServiceToken(row);
  }

  public async listServiceTokens(): Promise<ServiceTokenRecord[]> {
    const result = await this.pool.query<ServiceTokenRow>(
      `
      SELECT id, label, account_id, token_prefix, scope, is_active, last_used_at, note, created_at, updated_at
      FROM service_tokens
      ORDER BY created_at DESC
      `
    );

    return result.rows.map(mapServiceToken);
  }

  public async findServiceTokenById(serviceTokenId: string): Promise<ServiceTokenRecord | null> {
    const result = await this.pool.query<ServiceTokenRow>(
      `
      SELECT id, label, account_id, token_prefix, scope, is_active, last_used_at, note, created_at, updated_at
      FROM service_tokens
      WHERE id = $1
      LIMIT 1
      `,
      [serviceTokenId]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapServiceToken(row);
  }

  public async updateServiceToken(serviceTokenId: string, changes: ServiceTokenChanges): Promise<ServiceTokenRecord | null> {
    const result = await this.pool.query<ServiceTokenRow>(
      `
      UPDATE service_tokens
      SET label = CASE WHEN $2::boolean THEN $3 ELSE label END,
          scope = CASE WHEN $4::boolean THEN $5::text[] ELSE scope END,
          is_active = CASE WHEN $6::boolean THEN $7 ELSE is_active END,
          note = CASE WHEN $8::boolean THEN $9 ELSE note END,
          updated_at = NOW()
      WHERE id = $1
      RETURNING id, label, account_id, token_prefix, scope, is_active, last_used_at, note, created_at, updated_at
      `,
      [
        serviceTokenId,
        changes.label !== undefined,
        changes.label ?? null,
        changes.scope !== undefined,
        changes.scope ?? null,
        changes.isActive !== undefined,
        changes.isActive ?? null,
        changes.note !== undefined,
        changes.note ?? null
      ]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapServiceToken(row);
  }

  public async rotateServiceToken(input: RotateServiceTokenInput): Promise<ServiceTokenRecord | null> {
    const result = await this.pool.query<ServiceTokenRow>(
      `
      UPDATE service_tokens
      SET token_hash = $2,
          token_prefix = $3,
          updated_at = NOW()
      WHERE id = $1
      RETURNING id, label, account_id, token_prefix, scope, is_active, last_used_at, note, created_at, updated_at
      `,
      [input.serviceTokenId, input.tokenHash, input.tokenPrefix]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapServiceToken(row);
  }

  public async findActiveServiceTokenByHash(tokenHash: string): Promise<ServiceTokenAuthRecord | null> {
    const result = await this.pool.query<ServiceTokenAuthRow>(
      `
      SELECT
        t.id,
        t.label,
        t.account_id,
        t.token_prefix,
        t.scope,
        t.is_active,
        t.last_used_at,
        t.note,
        t.created_at,
        t.updated_at,
        a.login AS account_login,
        a.name AS account_name,
        a.is_active AS account_is_active,
        a.created_at AS account_created_at
      FROM service_tokens t
      INNER JOIN connector_accounts a
        ON a.id = t.account_id
      WHERE t.token_hash = $1
        AND t.is_active = TRUE
        AND a.is_active = TRUE
      LIMIT 1
      `,
      [tokenHash]
    );

    const row = getSingleRow(result.rows);
    if (row === null) {
      return null;
    }

    return {
      serviceToken: mapServiceToken(row),
      account: {
        id: row.account_id,
        login: row.account_login,
        name: row.account_name,
        isActive: row.account_is_active,
        createdAt: row.account_created_at
      }
    };
  }

  public async markServiceTokenUsed(serviceTokenId: string, usedAt: Date): Promise<void> {
    await this.pool.query(
      `
      UPDATE service_tokens
      SET last_used_at = $2
      WHERE id = $1
      `,
      [serviceTokenId, usedAt]
    );
  }
}
