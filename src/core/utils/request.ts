import type { Socket } from 'node:net';

import { DUMMY_BASE_URL } from '../../common/consts.js';

export interface ParsedRequestTarget {
  /**
   * Percent-encoded path, dot segments resolved. Used to find files, not for logging.
   */
  path: string;
  /**
   * Raw query string including the leading `?`, or an empty string.
   */
  search: string;
}

export function parseRequestTarget(rawUrl: string | undefined): ParsedRequestTarget {
  if (rawUrl === undefined) {
    return {
      path: '(unknown)',
      search: '',
    };
  }

  try {
    const parsedUrl = new URL(rawUrl, DUMMY_BASE_URL);

    return {
      path: parsedUrl.pathname,
      search: parsedUrl.search,
    };
  } catch {
    return {
      path: rawUrl,
      search: '',
    };
  }
}

/**
 * Path as the client sent it, percent-decoded but with dot segments left alone. Falls back
 * to the raw text when it doesn't decode.
 */
export function requestPathOf(rawUrl: string | undefined): string {
  if (rawUrl === undefined) {
    return '(unknown)';
  }

  const queryStart = rawUrl.indexOf('?');
  const rawPath = queryStart === -1 ? rawUrl : rawUrl.slice(0, queryStart);

  try {
    return decodeURIComponent(rawPath);
  } catch {
    return rawPath;
  }
}

/**
 * Formats the peer of a connection as `ip:port`, bracketing IPv6 addresses.
 * Read it while the request is live: a closed socket no longer reports its peer.
 */
export function formatRemoteAddress(socket: Socket): string {
  const address = socket.remoteAddress;
  if (address === undefined) {
    return '';
  }

  const host = address.includes(':') ? `[${address}]` : address;
  return socket.remotePort === undefined ? host : `${host}:${socket.remotePort}`;
}
