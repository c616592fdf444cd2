export const DUMMY_BASE_URL = 'http://static.local';

export const DEFAULT_PORT = 8080;
export const DEFAULT_STATIC_DIR = './static';

export const READ_TIMEOUT_MS = 10_000;
export const WRITE_TIMEOUT_MS = 10_000;
export const MAX_HEADER_SIZE = 1 << 20;
export const SHUTDOWN_TIMEOUT_MS = 5_000;

export const INDEX_FILE = 'index.html';

export const SERVED_METHODS = ['GET', 'HEAD'] as const;
export const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

export const STATIC_CONTENT_TYPES: Record<string, string> = {
  '.css': 'text/css; charset=utf-8',
  '.gif': 'image/gif',
  '.htm': 'text/html; charset=utf-8',
  '.html': 'text/html; charset=utf-8',
  '.ico': 'image/x-icon',
  '.jpeg': 'image/jpeg',
  '.jpg': 'image/jpeg',
  '.js': 'text/javascript; charset=utf-8',
  '.json': 'application/json; charset=utf-8',
  '.map': 'application/json; charset=utf-8',
  '.mjs': 'text/javascript; charset=utf-8',
  '.pdf': 'application/pdf',
  '.png': 'image/png',
  '.svg': 'image/svg+xml',
  '.txt': 'text/plain; charset=utf-8',
  '.wasm': 'application/wasm',
  '.webp': 'image/webp',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
  '.xml': 'text/xml; charset=utf-8',
};

export const enum HttpCode {
  Ok = 200,
  MovedPermanently = 301,
  NotModified = 304,
  BadRequest = 400,
  Forbidden = 403,
  NotFound = 404,
  MethodNotAllowed = 405,
  InternalServerError = 500,
}
