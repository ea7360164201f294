import { randomUUID } from 'node:crypto';

import type { Pool } from 'pg';

import type { ApiLogEntry, ApiLogRepository, CreateApiLogEntryInput } from './api-log-repository.js';

interface ApiLogRow {
  id: string;
  account_id: string | null;
  service_token_id: string | null;
  endpoint: string;
  method: string;
  request_ip: string | null;
  response_status_code: number;
  message: string;
  duration_ms: number;
  created_at: Date;
}

function mapApiLogRow(row: ApiLogRow): ApiLogEntry {
  return {
    id: row.id,
    accountId: row.account_id,
    serviceTokenId: row.service_token_id,
    endpoint: row.endpoint,
    method: row.method,
    requestIp: row.request_ip,
    responseStatusCode: row.response_status_code,
    message: row.message,
    durationMs: row.duration_ms,
    createdAt: row.created_at
  };
}

export class PostgresApiLogRepository implements ApiLogRepository {
  public constructor(private readonly pool: Pool) {}

  public async createEntry(input: CreateApiLogEntryInput): Promise<ApiLogEntry> {
    const result = await this.pool.query<ApiLogRow>(
      `
      INSERT INTO api_log_entries (
        id,
        account_id,
        service_token_id,
        endpoint,
        method,
        request_ip,
        response_status_code,
        message,
        duration_ms,
        created_at
      )
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, NOW())
      RETURNING *
      `,
      [
        randomUUID(),
        input.accountId,
        input.serviceTokenId,
        input.endpoint,
        input.method,
        input.requestIp,
        input.responseStatusCode,
        input.message,
        input.durationMs
      ]
    );

    const [row] = result.rows;
    if (row === undefined) {
      throw new Error('Failed to create api log row.');
    }

    return mapApiLogRow(row);
  }

  public async listRecent(limit: number): Promise<ApiLogEntry[]> {
    const result = await this.pool.query<ApiLogRow>(
      `
      SELECT *
      FROM api_log_entries
      ORDER BY created_at DESC, id DESC
      LIMIT $1
      `,
      [limit]
    );

    return result.rows.map(mapApiLogRow);
  }
}
