export interface ApiLogEntry {
  id: string;
  accountId: string | null;
  serviceTokenId: string | null;
  endpoint: string;
  method: string;
  requestIp: string | null;
  responseStatusCode: number;
  message: string;
  durationMs: number;
  createdAt: Date;
}

export interface CreateApiLogEntryInput {
  accountId: string | null;
  serviceTokenId: string | null;
  endpoint: string;
  method: string;
  requestIp: string | null;
  responseStatusCode: number;
  message: string;
  durationMs: number;
}

/** Append-only store of connector calls. */
export interface ApiLogRepository {
  createEntry(input: CreateApiLogEntryInput): Promise<ApiLogEntry>;
  listRecent(limit: number): Promise<ApiLogEntry[]>;
}
