import fs from 'node:fs';
import path from 'node:path';
import type http from 'node:http';
import { pipeline } from 'node:stream/promises';

import type { RequestHandler } from '../types/server.js';
import { HttpCode, INDEX_FILE, STATIC_CONTENT_TYPES } from '../common/consts.js';
import { getErrorCode } from '../common/logger.js';
import { sendRedirect, sendText } from './response.js';
import { parseRequestTarget } from './utils/request.js';

function getContentType(filePath: string): string {
  const extension = path.extname(filePath).toLowerCase();
  return STATIC_CONTENT_TYPES[extension] ?? 'application/octet-stream';
}

function isUnderDirectory(targetPath: string, rootDirectory: string): boolean {
  const relativePath = path.relative(rootDirectory, targetPath);
  return relativePath !== '..' && !relativePath.startsWith(`..${path.sep}`) && !path.isAbsolute(relativePath);
}

/**
 * Maps an encoded request path onto the filesystem. Returns `undefined` for paths that
 * can't be decoded or that try to leave the root.
 */
function resolveFilePath(rootDirectory: string, encodedPath: string): string | undefined {
  let decodedPath: string;

  try {
    decodedPath = decodeURIComponent(encodedPath);
  } catch {
    return undefined;
  }

  const segments = decodedPath.split('/');
  if (decodedPath.includes('\0') || segments.includes('..')) {
    return undefined;
  }

  const filePath = path.join(rootDirectory, ...segments.filter((segment) => segment.length > 0));
  return isUnderDirectory(filePath, rootDirectory) ? filePath : undefined;
}

function lastSegment(encodedPath: string): string {
  const trimmed = encodedPath.endsWith('/') ? encodedPath.slice(0, -1) : encodedPath;
  return trimmed.slice(trimmed.lastIndexOf('/') + 1);
}

function sendFsError(res: http.ServerResponse, error: unknown): void {
  const code = getErrorCode(error);

  if (code === 'ENOENT' || code === 'ENOTDIR') {
    sendText(res, HttpCode.NotFound, '404 page not found');
    return;
  }

  if (code === 'EACCES' || code === 'EPERM') {
    sendText(res, HttpCode.Forbidden, '403 Forbidden');
    return;
  }

  sendText(res, HttpCode.InternalServerError, '500 Internal Server Error');
}

async function statOrUndefined(filePath: string): Promise<fs.Stats | undefined> {
  try {
    return await fs.promises.stat(filePath);
  } catch (error) {
    const code = getErrorCode(error);

    if (code === 'ENOENT' || code === 'ENOTDIR') {
      return undefined;
    }

    throw error;
  }
}

function isNotModified(ifModifiedSince: string | undefined, stat: fs.Stats): boolean {
  if (ifModifiedSince === undefined) {
    return false;
  }

  const since = Date.parse(ifModifiedSince);
  if (Number.isNaN(since)) {
    return false;
  }

  // Last-Modified only carries whole seconds
  return Math.floor(stat.mtimeMs / 1000) * 1000 <= since;
}

async function streamStaticFile(
  req: http.IncomingMessage,
  res: http.ServerResponse,
  filePath: string,
  stat: fs.Stats,
): Promise<void> {
  res.setHeader('Last-Modified', stat.mtime.toUTCString());

  if (isNotModified(req.headers['if-modified-since'], stat)) {
    res.statusCode = HttpCode.NotModified;
    res.end();
    return;
  }

  res.statusCode = HttpCode.Ok;
  res.setHeader('Content-Type', getContentType(filePath));
  res.setHeader('Content-Length', String(stat.size));

  if (req.method === 'HEAD') {
    res.end();
    return;
  }

  await pipeline(fs.createReadStream(filePath), res);
}

/**
 * Serves files below `root`. Directories resolve to their `index.html`; a directory
 * without one is refused rather than listed.
 */
export function createStaticResponder(root: string): RequestHandler {
  const rootDirectory = path.resolve(root);

  return async (req, res) => {
    const target = parseRequestTarget(req.url);
    const filePath = resolveFilePath(rootDirectory, target.path);

    if (filePath === undefined) {
      sendText(res, HttpCode.BadRequest, '400 Bad Request');
      return;
    }

    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(filePath);
    } catch (error) {
      sendFsError(res, error);
      return;
    }

    const hasTrailingSlash = target.path.endsWith('/');

    if (stat.isDirectory()) {
      if (!hasTrailingSlash) {
        sendRedirect(res, `${lastSegment(target.path)}/${target.search}`);
        return;
      }

      const indexPath = path.join(filePath, INDEX_FILE);
      let indexStat: fs.Stats | undefined;
      try {
        indexStat = await statOrUndefined(indexPath);
      } catch (error) {
        sendFsError(res, error);
        return;
      }

      if (indexStat === undefined || !indexStat.isFile()) {
        sendText(res, HttpCode.Forbidden, '403 Forbidden');
        return;
      }

      await streamStaticFile(req, res, indexPath, indexStat);
      return;
    }

    if (hasTrailingSlash) {
      sendRedirect(res, `../${lastSegment(target.path)}${target.search}`);
      return;
    }

    if (!stat.isFile()) {
      sendText(res, HttpCode.NotFound, '404 page not found');
      return;
    }

    await streamStaticFile(req, res, filePath, stat);
  };
}
