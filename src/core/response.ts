import type { ServerResponse } from 'node:http';

import { HttpCode } from '../common/consts.js';

export function sendText(res: ServerResponse, statusCode: HttpCode, message: string): void {
  res.statusCode = statusCode;
  res.setHeader('Content-Type', 'text/plain; charset=utf-8');
  res.setHeader('X-Content-Type-Options', 'nosniff');
  res.end(`${message}\n`);
}

/**
 * Like {@link sendText}, for callers that may run after the handler already started the
 * response. A response whose headers are out can't change status, so its socket is dropped.
 */
export function safeSendText(res: ServerResponse, statusCode: HttpCode, message: string): void {
  if (res.writableEnded) {
    return;
  }

  if (res.headersSent) {
    res.destroy();
    return;
  }

  sendText(res, statusCode, message);
}

export function sendRedirect(res: ServerResponse, location: string): void {
  res.statusCode = HttpCode.MovedPermanently;
  res.setHeader('Location', location);
  res.end();
}
