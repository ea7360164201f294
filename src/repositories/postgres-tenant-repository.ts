import { randomUUID } from 'node:crypto';

import type { Pool, PoolClient } from 'pg';

import { isUniqueViolation } from '../db/pg-errors.js';
import { AppError } from '../errors/app-error.js';
import type {
  CreateTenantInput,
  ListTenantsInput,
  Tenant,
  TenantCredential,
  TenantRepository,
  UpsertTenantCredentialInput
} from './tenant-repository.js';

interface TenantRow {
  id: string;
  name: string;
  is_active: boolean;
  created_at: Date;
  updated_at: Date;
}

interface TenantCredentialRow {
  tenant_id: string;
  base_url: string;
  account_id: string;
  encrypted_api_key: string;
  created_at: Date;
  updated_at: Date;
}

function mapTenant(row: TenantRow): Tenant {
  return {
    id: row.id,
    name: row.name,
    isActive: row.is_active,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function mapCredential(row: TenantCredentialRow): TenantCredential {
  return {
    tenantId: row.tenant_id,
    baseUrl: row.base_url,
    accountId: row.account_id,
    encryptedApiKey: row.encrypted_api_key,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function getSingleRow<T>(rows: T[]): T | null {
  const [row] = rows;
  return row ?? null;
}

async function withTransaction<T>(pool: Pool, callback: (client: PoolClient) => Promise<T>): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    const result = await callback(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
}

export class PostgresTenantRepository implements TenantRepository {
  public constructor(private readonly pool: Pool) {}

  public async createTenant(input: CreateTenantInput): Promise<Tenant> {
    try {
      const result = await this.pool.query<TenantRow>(
        `
        INSERT INTO tenants (id, name, is_active, created_at, updated_at)
        VALUES ($1, $2, $3, NOW(), NOW())
        RETURNING *
        `,
        [randomUUID(), input.name.trim(), input.isActive ?? true]
      );

      const row = getSingleRow(result.rows);
      if (row === null) {
        throw new Error('Failed to create tenant row.');
      }

      return mapTenant(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new AppError(409, 'TENANT_NAME_IN_USE', 'A tenant with this name already exists.');
      }

      throw error;
    }
  }

  public async findTenantById(tenantId: string): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>('SELECT * FROM tenants WHERE id = $1 LIMIT 1', [tenantId]);
    const row = getSingleRow(result.rows);
    return row === null ? null : mapTenant(row);
  }

  public async findTenantByName(name: string): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>(
      'SELECT * FROM tenants WHERE LOWER(name) = LOWER($1) LIMIT 1',
      [name.trim()]
    );
    const row = getSingleRow(result.rows);
    return row === null ? null : mapTenant(row);
  }

  public async listTenants(input: ListTenantsInput): Promise<Tenant[]> {
    const result = await this.pool.query<TenantRow>(
      `
      SELECT *
      FROM tenants
      ORDER BY name ASC
      OFFSET $1
      LIMIT $2
      `,
      [input.offset, input.limit]
    );

    return result.rows.map(mapTenant);
  }

  public async setTenantActive(tenantId: string, isActive: boolean): Promise<Tenant | null> {
    const result = await this.pool.query<TenantRow>(
      `
      UPDATE tenants
      SET is_active = $2,
          updated_at = NOW()
      WHERE id = $1
      RETURNING *
      `,
      [tenantId, isActive]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapTenant(row);
  }

  public async deleteTenant(tenantId: string): Promise<boolean> {
    return withTransaction(this.pool, async (client) => {
      await client.query('DELETE FROM tenant_credentials WHERE tenant_id = $1', [tenantId]);
      const result = await client.query('DELETE FROM tenants WHERE id = $1', [tenantId]);
      return (result.rowCount ?? 0) > 0;
    });
  }

  public async findCredential(tenantId: string): Promise<TenantCredential | null> {
    const result = await this.pool.query<TenantCredentialRow>(
      'SELECT * FROM tenant_credentials WHERE tenant_id = $1 LIMIT 1',
      [tenantId]
    );
    const row = getSingleRow(result.rows);
    return row === null ? null : mapCredential(row);
  }

  public async upsertCredential(input: UpsertTenantCredentialInput): Promise<TenantCredential> {
    const result = await this.pool.query<TenantCredentialRow>(
      `
      INSERT INTO tenant_credentials (tenant_id, base_url, account_id, encrypted_api_key, created_at, updated_at)
      VALUES ($1, $2, $3, $4, NOW(), NOW())
      ON CONFLICT (tenant_id) DO UPDATE
      SET base_url = EXCLUDED.base_url,
          account_id = EXCLUDED.account_id,
          encrypted_api_key = EXCLUDED.encrypted_api_key,
          updated_at = NOW()
      RETURNING *
      `,
      [input.tenantId, input.baseUrl, input.accountId, input.encryptedApiKey]
    );

    const row = getSingleRow(result.rows);
    if (row === null) {
      throw new Error('Failed to upsert tenant credential row.');
    }

    return mapCredential(row);
  }
}
