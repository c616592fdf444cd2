import { once } from 'node:events';
import fs from 'node:fs/promises';
import http from 'node:http';
import os from 'node:os';
import path from 'node:path';

import type { LogSink } from '@/common/logger.js';

export interface RawResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export async function createTempDirectory(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDirectory(targetPath: string): Promise<void> {
  await fs.rm(targetPath, { recursive: true, force: true });
}

export async function writeFile(targetPath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(targetPath), { recursive: true });
  await fs.writeFile(targetPath, content, 'utf8');
}

export async function waitFor(predicate: () => boolean | Promise<boolean>, timeoutMs = 5000, stepMs = 20): Promise<void> {
  const startAt = Date.now();

  while (Date.now() - startAt <= timeoutMs) {
    if (await predicate()) {
      return;
    }

    await sleep(stepMs);
  }

  throw new Error(`Condition not met within ${timeoutMs}ms`);
}

export async function sleep(ms: number): Promise<void> {
  await new Promise((resolve) => setTimeout(resolve, ms));
}

export function baseUrlOf(server: http.Server): string {
  const address = server.address();

  if (address === null || typeof address === 'string') {
    throw new Error('Failed to resolve server address');
  }

  return `http://127.0.0.1:${address.port}`;
}

export async function listenEphemeral(server: http.Server): Promise<string> {
  server.listen(0, '127.0.0.1');

  if (!server.listening) {
    await once(server, 'listening');
  }

  return baseUrlOf(server);
}

export async function closeServer(server: http.Server): Promise<void> {
  if (!server.listening) {
    return;
  }

  server.closeAllConnections();
  await new Promise<void>((resolve, reject) => {
    server.close((error) => {
      if (error !== undefined) {
        reject(error);
        return;
      }

      resolve();
    });
  });
}

/**
 * Sends the path verbatim, without the normalisation `fetch` applies, and never follows redirects.
 */
export async function rawRequest(
  baseUrl: string,
  requestPath: string,
  options: { method?: string; headers?: http.OutgoingHttpHeaders } = {},
): Promise<RawResponse> {
  const url = new URL(baseUrl);

  return new Promise<RawResponse>((resolve, reject) => {
    const req = http.request(
      {
        host: url.hostname,
        port: url.port,
        path: requestPath,
        method: options.method ?? 'GET',
        headers: options.headers,
        agent: false,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', reject);
        res.on('end', () => {
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(chunks).toString('utf8'),
          });
        });
      },
    );

    req.on('error', reject);
    req.end();
  });
}

export interface LogCapture {
  sink: LogSink;
  records: () => Array<Record<string, unknown>>;
  byMessage: (msg: string) => Array<Record<string, unknown>>;
}

export function captureLogs(): LogCapture {
  const lines: string[] = [];

  const records = (): Array<Record<string, unknown>> =>
    lines.map((line): Record<string, unknown> => {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
        throw new Error(`Log line is not a JSON object: ${line}`);
      }

      return Object.fromEntries(Object.entries(parsed));
    });

  return {
    sink: (line) => {
      lines.push(line);
    },
    records,
    byMessage: (msg) => records().filter((record) => record.msg === msg),
  };
}
