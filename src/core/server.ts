import { setMaxListeners } from 'node:events';
import http from 'node:http';
import type { AddressInfo } from 'node:net';

import type { RequestHandler, ServerConfig, ServerState, ShutdownResult } from '../types/server.js';
import { HttpCode, SHUTDOWN_SIGNALS } from '../common/consts.js';
import { getErrorCode, getErrorMessage, type Logger } from '../common/logger.js';

import { withRequestLogging } from './request-logger.js';
import { safeSendText } from './response.js';
import { createRequestRouter } from './router.js';
import { createStaticResponder } from './static-files.js';
import { requestPathOf } from './utils/request.js';

export interface StaticServer {
  readonly httpServer: http.Server;
  readonly state: ServerState;
  /**
   * Number of requests whose response has not closed yet.
   */
  readonly inflight: number;
  start(): Promise<AddressInfo>;
  /**
   * Stops accepting connections and waits for in-flight requests, at most
   * `shutdownTimeoutMs`. Never rejects; repeated calls share the first result.
   */
  shutdown(): Promise<ShutdownResult>;
}

/**
 * Where shutdown signals come from. `process` satisfies it.
 */
export interface SignalSource {
  on(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
  removeListener(signal: NodeJS.Signals, listener: (signal: NodeJS.Signals) => void): unknown;
}

export interface RunHooks {
  signals?: SignalSource;
  exit?: (code: number) => void;
  /**
   * Replaces the directory-backed responder behind the logging middleware.
   */
  responder?: RequestHandler;
}

export function createStaticServer(
  config: ServerConfig,
  logger: Logger,
  responder: RequestHandler = createStaticResponder(config.staticDir),
): StaticServer {
  let state: ServerState = 'initial';
  const inflight = new Set<http.ServerResponse>();
  let shutdownPromise: Promise<ShutdownResult> | undefined;
  let onInflightDrained: (() => void) | undefined;

  // aborted at the shutdown deadline so stuck handlers don't hold back their records
  const abandonment = new AbortController();
  setMaxListeners(0, abandonment.signal);

  const handleRequest = withRequestLogging(logger, createRequestRouter(responder), {
    abandon: abandonment.signal,
  });

  const server = http.createServer(
    {
      maxHeaderSize: config.maxHeaderSize,
      requestTimeout: config.readTimeoutMs,
      headersTimeout: config.readTimeoutMs,
    },
    (req, res) => {
      inflight.add(res);
      if (state !== 'running') {
        res.shouldKeepAlive = false;
      }

      const writeDeadline = setTimeout(() => {
        logger.warn('Response timed out', {
          method: req.method ?? 'GET',
          path: requestPathOf(req.url),
          timeoutMs: config.writeTimeoutMs,
        });
        res.destroy();
      }, config.writeTimeoutMs);

      res.once('close', () => {
        clearTimeout(writeDeadline);
        inflight.delete(res);

        // deferred past the logging middleware's own close listener
        if (state === 'shutting_down') {
          setImmediate(() => server.closeIdleConnections());
        } else if (inflight.size === 0 && onInflightDrained !== undefined) {
          setImmediate(onInflightDrained);
        }
      });

      handleRequest(req, res).catch((error) => {
        // client went away mid-response
        if (res.destroyed && getErrorCode(error) === 'ERR_STREAM_PREMATURE_CLOSE') {
          return;
        }

        logger.error('Request failed', {
          method: req.method ?? 'GET',
          path: requestPathOf(req.url),
          error: getErrorMessage(error),
        });

        safeSendText(res, HttpCode.InternalServerError, '500 Internal Server Error');
      });
    },
  );

  const start = (): Promise<AddressInfo> => {
    if (state !== 'initial') {
      return Promise.reject(new Error(`Cannot start server in state ${state}`));
    }

    return new Promise<AddressInfo>((resolve, reject) => {
      const onError = (error: Error): void => {
        server.removeListener('listening', onListening);
        reject(error);
      };

      const onListening = (): void => {
        server.removeListener('error', onError);

        if (state !== 'initial') {
          server.close();
          reject(new Error('Server shut down before it started listening'));
          return;
        }

        const address = server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Failed to resolve server address'));
          return;
        }

        state = 'running';
        resolve(address);
      };

      server.once('error', onError);
      server.once('listening', onListening);
      server.listen(config.port, config.host);
    });
  };

  const drain = (): Promise<ShutdownResult> => {
    state = 'shutting_down';

    for (const res of inflight) {
      if (!res.headersSent) {
        res.shouldKeepAlive = false;
      }
    }

    return new Promise<ShutdownResult>((resolve) => {
      let settled = false;

      const deadline = setTimeout(() => {
        settled = true;
        state = 'stopped';
        logger.error('Server forced to shutdown', {
          error: `shutdown deadline of ${config.shutdownTimeoutMs}ms exceeded`,
          inflight: inflight.size,
        });

        abandonment.abort();
        if (inflight.size === 0) {
          server.closeAllConnections();
          resolve('forced');
          return;
        }

        // resolve only once every dropped request has been recorded
        onInflightDrained = () => resolve('forced');
        server.closeAllConnections();
      }, config.shutdownTimeoutMs);

      server.close(() => {
        clearTimeout(deadline);
        if (settled) {
          return;
        }

        settled = true;
        state = 'stopped';
        logger.info('Server exited properly');
        resolve('clean');
      });

      server.closeIdleConnections();
    });
  };

  const shutdown = (): Promise<ShutdownResult> => {
    if (shutdownPromise !== undefined) {
      return shutdownPromise;
    }

    if (state === 'initial') {
      state = 'stopped';
      shutdownPromise = Promise.resolve('clean');
      return shutdownPromise;
    }

    shutdownPromise = drain();
    return shutdownPromise;
  };

  return {
    httpServer: server,
    get state() {
      return state;
    },
    get inflight() {
      return inflight.size;
    },
    start,
    shutdown,
  };
}

export interface ShutdownSignalTrap {
  /**
   * Resolves with the first SIGINT/SIGTERM.
   */
  readonly received: Promise<NodeJS.Signals>;
  /**
   * Removes the listeners; later signals get the default behavior again.
   */
  release(): void;
}

/**
 * Listens for SIGINT/SIGTERM until released. Signals after the first go to `onRepeat`, so
 * a second Ctrl-C during a drain doesn't kill the process.
 */
export function trapShutdownSignals(
  signals: SignalSource,
  onRepeat: (signal: NodeJS.Signals) => void,
): ShutdownSignalTrap {
  let resolveReceived: (signal: NodeJS.Signals) => void = () => {};
  const received = new Promise<NodeJS.Signals>((resolve) => {
    resolveReceived = resolve;
  });
  let first = true;

  const onSignal = (signal: NodeJS.Signals): void => {
    if (!first) {
      onRepeat(signal);
      return;
    }

    first = false;
    resolveReceived(signal);
  };

  for (const name of SHUTDOWN_SIGNALS) {
    signals.on(name, onSignal);
  }

  return {
    received,
    release() {
      for (const name of SHUTDOWN_SIGNALS) {
        signals.removeListener(name, onSignal);
      }
    },
  };
}

/**
 * Starts serving and arms SIGINT/SIGTERM for a graceful shutdown. A listen failure, or a
 * server error after listening, exits with `1`; a finished shutdown exits with `0`, forced
 * or not. Resolves with the running server, or `undefined` when it never started.
 */
export async function runServer(
  config: ServerConfig,
  logger: Logger,
  hooks: RunHooks = {},
): Promise<StaticServer | undefined> {
  const signals = hooks.signals ?? process;
  const exit = hooks.exit ?? ((code: number) => process.exit(code));
  const addr = `${config.host ?? ''}:${config.port}`;

  const app = createStaticServer(config, logger, hooks.responder);

  logger.info('Starting server', {
    port: String(config.port),
    dir: config.staticDir,
  });

  try {
    await app.start();
  } catch (error) {
    logger.error('Could not listen on', { addr, error: getErrorMessage(error) });
    exit(1);
    return undefined;
  }

  app.httpServer.on('error', (error) => {
    logger.error('Server failed', { addr, error: getErrorMessage(error) });
    exit(1);
  });

  const trap = trapShutdownSignals(signals, (signal) => {
    logger.warn('Shutdown already in progress', { signal });
  });

  void trap.received
    .then(async (signal) => {
      logger.info('Server is shutting down...', { signal });
      await app.shutdown();
      trap.release();
      exit(0);
    })
    .catch((error) => {
      trap.release();
      logger.error('Server shutdown failed', { error: getErrorMessage(error) });
      exit(1);
    });

  return app;
}
