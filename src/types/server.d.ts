import type http from 'node:http';

export interface ServerConfig {
  /**
   * TCP port to listen on. `0` asks the operating system for an ephemeral port.
   */
  readonly port: number;

  /**
   * Bind address. When omitted the server listens on all interfaces.
   */
  readonly host?: string;

  /**
   * Root directory served for every path. Resolved against the working directory.
   */
  readonly staticDir: string;

  readonly readTimeoutMs: number;

  readonly writeTimeoutMs: number;

  readonly maxHeaderSize: number;

  /**
   * How long a shutdown waits for in-flight requests before dropping their connections.
   */
  readonly shutdownTimeoutMs: number;
}

/**
 * Settles once the handler is done with the response. A handler may return before the
 * response is flushed; callers that need the wire outcome listen for `close`.
 */
export type RequestHandler = (req: http.IncomingMessage, res: http.ServerResponse) => void | Promise<void>;

export interface RequestObservation {
  method: string;
  path: string;
  /**
   * `0` when no status line ever reached the wire.
   */
  status: number;
  remote_addr: string;
  user_agent: string;
  /**
   * Milliseconds between request start and emission.
   */
  duration: number;
  bytes: number;
}

export type ServerState = 'initial' | 'running' | 'shutting_down' | 'stopped';

export type ShutdownResult = 'clean' | 'forced';
