import type http from 'node:http';

import type { RequestHandler, RequestObservation } from '../types/server.js';
import { getErrorMessage, type Logger } from '../common/logger.js';
import { formatRemoteAddress, requestPathOf } from './utils/request.js';

export interface ResponseCapture {
  /**
   * First status code written to the wire, `0` until then.
   */
  status(): number;
  bytes(): number;
  restore(): void;
}

function chunkByteLength(chunk: unknown, encoding: unknown): number {
  if (typeof chunk === 'string') {
    return Buffer.byteLength(chunk, typeof encoding === 'string' && Buffer.isEncoding(encoding) ? encoding : 'utf8');
  }

  if (ArrayBuffer.isView(chunk)) {
    return chunk.byteLength;
  }

  return 0;
}

/**
 * Decorates `res` in place so that status and body size can be observed while the inner
 * handler keeps the full `ServerResponse` surface (piping included). Node flushes the
 * implicit status line through `writeHead` too, so every response that reaches the
 * client is seen here.
 */
export function captureResponse(res: http.ServerResponse): ResponseCapture {
  const originalWriteHead = res.writeHead;
  const originalWrite = res.write;
  const originalEnd = res.end;
  let status = 0;
  let bytes = 0;
  let restored = false;

  res.writeHead = ((...args: unknown[]) => {
    const statusCode = args[0];
    if (status === 0 && typeof statusCode === 'number') {
      status = statusCode;
    }

    return Reflect.apply(originalWriteHead, res, args);
  }) as typeof res.writeHead;

  res.write = ((...args: unknown[]) => {
    if (!res.destroyed) {
      bytes += chunkByteLength(args[0], args[1]);
    }

    return Reflect.apply(originalWrite, res, args);
  }) as typeof res.write;

  res.end = ((...args: unknown[]) => {
    if (!res.destroyed && typeof args[0] !== 'function') {
      bytes += chunkByteLength(args[0], args[1]);
    }

    return Reflect.apply(originalEnd, res, args);
  }) as typeof res.end;

  return {
    status: () => status,
    bytes: () => bytes,
    restore() {
      if (restored) {
        return;
      }

      res.writeHead = originalWriteHead;
      res.write = originalWrite;
      res.end = originalEnd;
      restored = true;
    },
  };
}

function elapsedMs(startedAt: bigint): number {
  return Number(process.hrtime.bigint() - startedAt) / 1e6;
}

export interface RequestLoggingOptions {
  /**
   * Once aborted, a request whose response has closed is recorded right away instead of
   * waiting for its handler to settle.
   */
  abandon?: AbortSignal;
}

/**
 * Wraps `next` so that every request produces exactly one `HTTP Request` record, emitted
 * once the handler has settled and the response is closed. Errors from `next` propagate
 * unchanged.
 */
export function withRequestLogging(
  logger: Logger,
  next: RequestHandler,
  options: RequestLoggingOptions = {},
): (req: http.IncomingMessage, res: http.ServerResponse) => Promise<void> {
  const { abandon } = options;

  return async (req, res) => {
    const startedAt = process.hrtime.bigint();
    const method = req.method ?? 'GET';
    const path = requestPathOf(req.url);
    const remoteAddr = formatRemoteAddress(req.socket);
    const userAgent = req.headers['user-agent'] ?? '';
    const capture = captureResponse(res);
    let emitted = false;
    let settled = false;
    let closed = false;

    const onAbandon = (): void => {
      if (closed) {
        emit();
      }
    };

    const emit = (): void => {
      if (emitted) {
        return;
      }

      emitted = true;
      capture.restore();
      abandon?.removeEventListener('abort', onAbandon);

      const observation: RequestObservation = {
        method,
        path,
        status: capture.status(),
        remote_addr: remoteAddr,
        user_agent: userAgent,
        duration: elapsedMs(startedAt),
        bytes: capture.bytes(),
      };

      try {
        logger.info('HTTP Request', { ...observation });
      } catch (error) {
        console.error(`request log failed: ${getErrorMessage(error)}`);
      }
    };

    abandon?.addEventListener('abort', onAbandon, { once: true });

    res.once('close', () => {
      closed = true;
      if (settled || abandon?.aborted === true) {
        emit();
      }
    });

    try {
      await next(req, res);
    } finally {
      settled = true;
      if (closed) {
        emit();
      }
    }
  };
}
