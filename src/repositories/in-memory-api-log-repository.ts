import { randomUUID } from 'node:crypto';

import type { ApiLogEntry, ApiLogRepository, CreateApiLogEntryInput } from './api-log-repository.js';

function cloneEntry(entry: ApiLogEntry): ApiLogEntry {
  return {
    ...entry,
    createdAt: new Date(entry.createdAt)
  };
}

export class InMemoryApiLogRepository implements ApiLogRepository {
  private readonly entries: ApiLogEntry[] = [];

  public createEntry(input: CreateApiLogEntryInput): Promise<ApiLogEntry> {
    const entry: ApiLogEntry = {
      id: randomUUID(),
      ...input,
      createdAt: new Date()
    };

    this.entries.push(entry);
    return Promise.resolve(cloneEntry(entry));
  }

  public listRecent(limit: number): Promise<ApiLogEntry[]> {
    const recent = this.entries
      .map((entry, index) => ({ entry, index }))
      .sort((left, right) => right.entry.createdAt.getTime() - left.entry.createdAt.getTime() || right.index - left.index)
      .slice(0, limit)
      .map(({ entry }) => cloneEntry(entry));

    return Promise.resolve(recent);
  }
}
