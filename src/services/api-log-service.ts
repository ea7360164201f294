import type { ApiLogEntry, ApiLogRepository, CreateApiLogEntryInput } from '../repositories/api-log-repository.js';

export type ApiLogInput = CreateApiLogEntryInput;

const MAX_MESSAGE_LENGTH = 500;

export class ApiLogService {
  public constructor(private readonly repository: ApiLogRepository) {}

  public async record(entry: ApiLogInput): Promise<ApiLogEntry> {
    return this.repository.createEntry({
      ...entry,
      message: entry.message.slice(0, MAX_MESSAGE_LENGTH),
      durationMs: Math.max(0, Math.round(entry.durationMs))
    });
  }

  public async recordSafely(entry: ApiLogInput): Promise<void> {
    try {
      const created = await this.record(entry);
      console.log('api_log_recorded', {
        id: created.id,
        endpoint: created.endpoint,
        statusCode: created.responseStatusCode
      });
    } catch (error) {
      console.error('api_log_write_failed', {
        endpoint: entry.endpoint,
        statusCode: entry.responseStatusCode,
        error: error instanceof Error ? error.message : 'unknown'
      });
    }
  }

  public async listRecent(limit = 50): Promise<ApiLogEntry[]> {
    return this.repository.listRecent(limit);
  }
}
