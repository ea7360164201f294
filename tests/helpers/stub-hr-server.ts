import type { AddressInfo } from 'node:net';
import type { Server } from 'node:http';

import express, { type Express } from 'express';
import multer from 'multer';

export interface RecordedFile {
  field: string;
  originalName: string;
  mimeType: string;
  size: number;
}

export interface RecordedRequest {
  method: string;
  path: string;
  query: Record<string, unknown>;
  authorization: string | undefined;
  body: unknown;
  files: RecordedFile[];
}

export interface StubHrServer {
  baseUrl: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
}

function listen(app: Express): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(0, '127.0.0.1', () => {
      resolve(server);
    });
    server.once('error', reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.closeAllConnections();
    server.close((error) => {
      if (error !== undefined) {
        reject(error);
        return;
      }

      resolve();
    });
  });
}

function baseUrlOf(server: Server): string {
  const address: AddressInfo | string | null = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Stub server is not listening on a TCP port.');
  }

  return `http://127.0.0.1:${address.port}`;
}

/**
 * In-process HR backend on an ephemeral port. `configure` registers the
 * routes under test; every request is recorded before it reaches them.
 */
export async function startStubHrServer(configure: (app: Express) => void): Promise<StubHrServer> {
  const requests: RecordedRequest[] = [];
  const app = express();

  app.use(express.json());
  app.use(multer({ storage: multer.memoryStorage() }).any());
  app.use((request, _response, next) => {
    const uploaded = Array.isArray(request.files) ? request.files : [];
    requests.push({
      method: request.method,
      path: request.path,
      query: { ...request.query },
      authorization: request.header('authorization'),
      body: request.body,
      files: uploaded.map((file) => ({
        field: file.fieldname,
        originalName: file.originalname,
        mimeType: file.mimetype,
        size: file.size
      }))
    });
    next();
  });

  configure(app);

  const server = await listen(app);

  return {
    baseUrl: baseUrlOf(server),
    requests,
    close: () => closeServer(server)
  };
}

/** A base URL nothing listens on: the port was bound once and released. */
export async function unreachableBaseUrl(): Promise<string> {
  const server = await listen(express());
  const baseUrl = baseUrlOf(server);
  await closeServer(server);
  return baseUrl;
}
