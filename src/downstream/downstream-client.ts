import { performance } from 'node:perf_hooks';
import type { Readable } from 'node:stream';

import axios, { isAxiosError, type AxiosInstance, type AxiosResponse, type RawAxiosRequestHeaders } from 'axios';

import { AppError } from '../errors/app-error.js';
import { recordDownstreamError, recordDownstreamRequest } from '../telemetry/metrics.js';

const BODY_PREVIEW_LENGTH = 200;

export type DownstreamMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** Where and as whom a single outbound call is made. Never cached. */
export interface DownstreamTarget {
  baseUrl: string;
  serviceToken: string;
}

export interface JsonRequestOptions {
  method?: DownstreamMethod;
  body?: unknown;
  params?: Record<string, string | number>;
}

export interface MultipartFile {
  field: string;
  filename: string;
  content: Buffer;
  contentType: string;
}

export interface MultipartPayload {
  fields: Record<string, string>;
  files: MultipartFile[];
}

export interface DownstreamDownload {
  stream: Readable;
  contentType: string;
  contentDisposition: string;
  contentLength: number | null;
  /** Drops the upstream connection. Safe to call more than once. */
  release(): void;
}

export interface DownstreamClientOptions {
  timeoutMs: number;
}

type Operation = 'json' | 'multipart' | 'download';

function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

function preview(text: string): string {
  return text.length > BODY_PREVIEW_LENGTH ? `${text.slice(0, BODY_PREVIEW_LENGTH)}...` : text;
}

function headerValue(response: AxiosResponse, name: string): string | null {
  const value: unknown = response.headers[name];
  if (typeof value === 'string' && value.length > 0) {
    return value;
  }

  if (typeof value === 'number') {
    return String(value);
  }

  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Picks a human readable reason out of a downstream error body, which may be
 * `{ message }`, `{ error: "..." }`, `{ error: { message } }`,
 * `{ error_description }` or `{ detail }`.
 */
export function extractDownstreamMessage(bodyText: string, fallback: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bodyText);
  } catch {
    return bodyText.trim().length > 0 ? preview(bodyText.trim()) : fallback;
  }

  if (!isRecord(parsed)) {
    return fallback;
  }

  const candidates: unknown[] = [parsed.message, parsed.error, parsed.error_description, parsed.detail];
  for (const candidate of candidates) {
    if (typeof candidate === 'string' && candidate.length > 0) {
      return candidate;
    }

    if (isRecord(candidate) && typeof candidate.message === 'string' && candidate.message.length > 0) {
      return candidate.message;
    }
  }

  return fallback;
}

async function readStreamText(stream: Readable, limit: number): Promise<string> {
  const chunks: Buffer[] = [];
  let size = 0;

  for await (const chunk of stream) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
    chunks.push(buffer);
    size += buffer.length;
    if (size >= limit) {
      break;
    }
  }

  stream.destroy();
  return Buffer.concat(chunks).toString('utf8');
}

/**
 * Outbound HTTP to a tenant's HR backend. Every call authenticates with the
 * tenant's service token and shares one timeout ceiling; transport and
 * protocol failures surface as `AppError`s with gateway statuses.
 */
export class DownstreamClient {
  private readonly http: AxiosInstance;

  public constructor(options: DownstreamClientOptions) {
    this.http = axios.create({
      timeout: options.timeoutMs,
      validateStatus: () => true,
      transitional: {
        clarifyTimeoutError: true
      }
    });
  }

  public async requestJson(target: DownstreamTarget, path: string, options: JsonRequestOptions = {}): Promise<unknown> {
    const method = options.method ?? 'GET';
    const headers: RawAxiosRequestHeaders = {
      ...this.authorization(target),
      Accept: 'application/json'
    };

    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const response = await this.send<string>('json', method, path, () => this.http.request<string>({
      url: joinUrl(target.baseUrl, path),
      method,
      headers,
      params: options.params,
      data: options.body === undefined ? undefined : JSON.stringify(options.body),
      responseType: 'text'
    }));

    return this.parseJsonResponse(method, path, response);
  }

  public async sendMultipart(target: DownstreamTarget, path: string, payload: MultipartPayload): Promise<unknown> {
    const form = new FormData();
    for (const [name, value] of Object.entries(payload.fields)) {
      form.append(name, value);
    }

    for (const file of payload.files) {
      form.append(file.field, new Blob([file.content], { type: file.contentType }), file.filename);
    }

    const response = await this.send<string>('multipart', 'POST', path, () => this.http.request<string>({
      url: joinUrl(target.baseUrl, path),
      method: 'POST',
      headers: {
        ...this.authorization(target),
        Accept: 'application/json'
      },
      data: form,
      responseType: 'text'
    }));

    return this.parseJsonResponse('POST', path, response);
  }

  public async openDownload(target: DownstreamTarget, path: string): Promise<DownstreamDownload> {
    const response = await this.send<Readable>('download', 'GET', path, () => this.http.request<Readable>({
      url: joinUrl(target.baseUrl, path),
      method: 'GET',
      headers: this.authorization(target),
      responseType: 'stream'
    }));

    const stream = response.data;

    if (response.status < 200 || response.status >= 300) {
      const bodyText = await readStreamText(stream, BODY_PREVIEW_LENGTH * 4);
      throw this.translateStatus('GET', path, response.status, bodyText);
    }

    const contentLengthHeader = headerValue(response, 'content-length');
    const contentLength = contentLengthHeader === null ? null : Number.parseInt(contentLengthHeader, 10);

    return {
      stream,
      contentType: headerValue(response, 'content-type') ?? 'application/octet-stream',
      contentDisposition: headerValue(response, 'content-disposition') ?? 'attachment',
      contentLength: contentLength === null || Number.isNaN(contentLength) ? null : contentLength,
      release: () => {
        if (!stream.destroyed) {
          stream.destroy();
        }
      }
    };
  }

  private authorization(target: DownstreamTarget): RawAxiosRequestHeaders {
    return { Authorization: `Bearer ${target.serviceToken}` };
  }

  private async send<T>(
    operation: Operation,
    method: DownstreamMethod,
    path: string,
    perform: () => Promise<AxiosResponse<T>>
  ): Promise<AxiosResponse<T>> {
    const startedAt = performance.now();

    try {
      const response = await perform();
      recordDownstreamRequest({ operation, method, status_code: response.status }, performance.now() - startedAt);
      return response;
    } catch (error) {
      recordDownstreamRequest({ operation, method, status_code: 0 }, performance.now() - startedAt);
      throw this.translateTransportError(operation, method, path, error);
    }
  }

  private translateTransportError(operation: Operation, method: DownstreamMethod, path: string, error: unknown): unknown {
    if (!isAxiosError(error) || error.response !== undefined) {
      return error;
    }

    if (error.code === 'ETIMEDOUT' || error.code === 'ECONNABORTED') {
      recordDownstreamError({ operation, reason: 'timeout' });
      console.warn('downstream_request_timeout', { method, path });
      return new AppError(504, 'UPSTREAM_TIMEOUT', 'Request to HR system timed out.');
    }

    recordDownstreamError({ operation, reason: 'unavailable' });
    console.warn('downstream_request_unavailable', { method, path, code: error.code ?? 'unknown' });
    return new AppError(503, 'UPSTREAM_UNAVAILABLE', 'Could not connect to HR system.');
  }

  private parseJsonResponse(method: DownstreamMethod, path: string, response: AxiosResponse<string>): unknown {
    const bodyText = typeof response.data === 'string' ? response.data : '';

    if (response.status < 200 || response.status >= 300) {
      throw this.translateStatus(method, path, response.status, bodyText);
    }

    if (response.status === 204 || bodyText.trim().length === 0) {
      return null;
    }

    try {
      return JSON.parse(bodyText);
    } catch {
      recordDownstreamError({ operation: 'json', reason: 'malformed_body' });
      console.warn('downstream_response_malformed', {
        method,
        path,
        statusCode: response.status,
        bodyPreview: preview(bodyText)
      });
      throw new AppError(502, 'UPSTREAM_BAD_RESPONSE', 'Invalid response from HR system.');
    }
  }

  private translateStatus(method: DownstreamMethod, path: string, status: number, bodyText: string): AppError {
    console.warn('downstream_request_rejected', {
      method,
      path,
      statusCode: status,
      bodyPreview: preview(bodyText)
    });

    if (status >= 400 && status < 500) {
      recordDownstreamError({ reason: 'client_error', status_code: status });
      const reason = extractDownstreamMessage(bodyText, `HTTP ${status}`);
      return new AppError(status, 'UPSTREAM_REJECTED', `HR backend error: ${reason}`);
    }

    recordDownstreamError({ reason: 'bad_response', status_code: status });
    return new AppError(502, 'UPSTREAM_BAD_RESPONSE', 'Invalid response from HR system.');
  }
}
