import { randomUUID } from 'node:crypto';

import type { Pool } from 'pg';

import { isUniqueViolation } from '../db/pg-errors.js';
import { AppError } from '../errors/app-error.js';
import type {
  CreatePrincipalInput,
  ListPrincipalsInput,
  Principal,
  PrincipalChanges,
  PrincipalRepository
} from './principal-repository.js';

interface PrincipalRow {
  id: string;
  email: string;
  password_hash: string;
  full_name: string | null;
  job_title: string | null;
  phone: string | null;
  tenant_id: string;
  is_active: boolean;
  is_admin: boolean;
  hr_employee_id: number | null;
  password_updated_at: Date;
  failed_login_attempts: number;
  lockout_until: Date | null;
  reset_token_hash: string | null;
  reset_token_expires_at: Date | null;
  created_at: Date;
  updated_at: Date;
}

interface CountRow {
  count: string;
}

function mapPrincipal(row: PrincipalRow): Principal {
  return {
    id: row.id,
    email: row.email,
    passwordHash: row.password_hash,
    fullName: row.full_name,
    jobTitle: row.job_title,
    phone: row.phone,
    tenantId: row.tenant_id,
    isActive: row.is_active,
    isAdmin: row.is_admin,
    hrEmployeeId: row.hr_employee_id,
    passwordUpdatedAt: row.password_updated_at,
    failedLoginAttempts: row.failed_login_attempts,
    lockoutUntil: row.lockout_until,
    resetTokenHash: row.reset_token_hash,
    resetTokenExpiresAt: row.reset_token_expires_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

function getSingleRow<T>(rows: T[]): T | null {
  const [row] = rows;
  return row ?? null;
}

function emailInUse(): AppError {
  return new AppError(409, 'PRINCIPAL_EMAIL_IN_USE', 'Email is already registered.');
}

function collectAssignments(changes: PrincipalChanges, now: Date): { clauses: string[]; values: unknown[] } {
  const clauses: string[] = [];
  const values: unknown[] = [];

  const assign = (column: string, value: unknown): void => {
    values.push(value);
    clauses.push(`${column} = $${values.length + 1}`);
  };

  if (changes.email !== undefined) {
    assign('email', changes.email.trim().toLowerCase());
  }

  if (changes.passwordHash !== undefined) {
    assign('password_hash', changes.passwordHash);
    assign('password_updated_at', now);
  }

  if (changes.fullName !== undefined) {
    assign('full_name', changes.fullName);
  }

  if (changes.jobTitle !== undefined) {
    assign('job_title', changes.jobTitle);
  }

  if (changes.phone !== undefined) {
    assign('phone', changes.phone);
  }

  if (changes.tenantId !== undefined) {
    assign('tenant_id', changes.tenantId);
  }

  if (changes.isActive !== undefined) {
    assign('is_active', changes.isActive);
  }

  if (changes.isAdmin !== undefined) {
    assign('is_admin', changes.isAdmin);
  }

  if (changes.hrEmployeeId !== undefined) {
    assign('hr_employee_id', changes.hrEmployeeId);
  }

  assign('updated_at', now);
  return { clauses, values };
}

export class PostgresPrincipalRepository implements PrincipalRepository {
  public constructor(private readonly pool: Pool) {}

  public async createPrincipal(input: CreatePrincipalInput): Promise<Principal> {
    const now = new Date();

    try {
      const result = await this.pool.query<PrincipalRow>(
        `
        INSERT INTO principals (
          id,
          email,
          password_hash,
          full_name,
          job_title,
          phone,
          tenant_id,
          is_active,
          is_admin,
          hr_employee_id,
          password_updated_at,
          failed_login_attempts,
          lockout_until,
          created_at,
          updated_at
        )
        VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, 0, NULL, $11, $11)
        RETURNING *
        `,
        [
          randomUUID(),
          input.email.trim().toLowerCase(),
          input.passwordHash,
          input.fullName ?? null,
          input.jobTitle ?? null,
          input.phone ?? null,
          input.tenantId,
          input.isActive ?? true,
          input.isAdmin ?? false,
          input.hrEmployeeId ?? null,
          now
        ]
      );

      const row = getSingleRow(result.rows);
      if (row === null) {
        throw new Error('Failed to create principal row.');
      }

      return mapPrincipal(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw emailInUse();
      }

      throw error;
    }
  }

  public async findPrincipalById(principalId: string): Promise<Principal | null> {
    const result = await this.pool.query<PrincipalRow>(
      `
      SELECT *
      FROM principals
      WHERE id = $1
      LIMIT 1
      `,
      [principalId]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapPrincipal(row);
  }

  public async findPrincipalByEmail(email: string): Promise<Principal | null> {
    const result = await this.pool.query<PrincipalRow>(
      `
      SELECT *
      FROM principals
      WHERE email = $1
      LIMIT 1
      `,
      [email.trim().toLowerCase()]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapPrincipal(row);
  }

  public async listPrincipals(input: ListPrincipalsInput): Promise<Principal[]> {
    const result = await this.pool.query<PrincipalRow>(
      `
      SELECT *
      FROM principals
      ORDER BY created_at ASC, email ASC
      OFFSET $1
      LIMIT $2
      `,
      [input.offset, input.limit]
    );

    return result.rows.map(mapPrincipal);
  }

  public async countPrincipalsInTenant(tenantId: string): Promise<number> {
    const result = await this.pool.query<CountRow>(
      'SELECT COUNT(*)::text AS count FROM principals WHERE tenant_id = $1',
      [tenantId]
    );

    return Number(getSingleRow(result.rows)?.count ?? '0');
  }

  public async updatePrincipal(principalId: string, changes: PrincipalChanges, now: Date): Promise<Principal | null> {
    const { clauses, values } = collectAssignments(changes, now);

    try {
      const result = await this.pool.query<PrincipalRow>(
        `
        UPDATE principals
        SET ${clauses.join(',\n            ')}
        WHERE id = $1
        RETURNING *
        `,
        [principalId, ...values]
      );

      const row = getSingleRow(result.rows);
      return row === null ? null : mapPrincipal(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw emailInUse();
      }

      throw error;
    }
  }

  public async deletePrincipal(principalId: string): Promise<boolean> {
    const result = await this.pool.query('DELETE FROM principals WHERE id = $1', [principalId]);
    return (result.rowCount ?? 0) > 0;
  }

  public async recordFailedLogin(principalId: string, failedLoginAttempts: number, lockoutUntil: Date | null): Promise<void> {
    await this.pool.query(
      `
      UPDATE principals
      SET failed_login_attempts = $2,
          lockout_until = $3,
          updated_at = NOW()
      WHERE id = $1
      `,
      [principalId, failedLoginAttempts, lockoutUntil]
    );
  }

  public async clearFailedLoginState(principalId: string): Promise<void> {
    await this.pool.query(
      `
      UPDATE principals
      SET failed_login_attempts = 0,
          lockout_until = NULL,
          updated_at = NOW()
      WHERE id = $1
      `,
      [principalId]
    );
  }

  public async setPasswordResetToken(principalId: string, tokenHash: string, expiresAt: Date): Promise<void> {
    await this.pool.query(
      `
      UPDATE principals
      SET reset_token_hash = $2,
          reset_token_expires_at = $3,
          updated_at = NOW()
      WHERE id = $1
      `,
      [principalId, tokenHash, expiresAt]
    );
  }

  public async resetPasswordWithToken(tokenHash: string, passwordHash: string, now: Date): Promise<Principal | null> {
    const result = await this.pool.query<PrincipalRow>(
      `
      UPDATE principals
      SET password_hash = $2,
          password_updated_at = $3,
          reset_token_hash = NULL,
          reset_token_expires_at = NULL,
          failed_login_attempts = 0,
          lockout_until = NULL,
          updated_at = $3
      WHERE reset_token_hash = $1
        AND reset_token_expires_at > $3
        AND is_active = TRUE
      RETURNING *
      `,
      [tokenHash, passwordHash, now]
    );

    const row = getSingleRow(result.rows);
    return row === null ? null : mapPrincipal(row);
  }
}
