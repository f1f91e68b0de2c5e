/**
 * Deck static file serving. `/` maps to the generated index.html; every
 * response is marked no-cache so a reload always sees the latest build.
 */

import type { IncomingMessage, ServerResponse } from 'http';
import { readFile, stat } from 'fs/promises';
import { extname, join } from 'path';
import { MIME_TYPES, OUTPUT_FILE } from '../../config.js';
import { safePath, sendError } from '../utils.js';

function decodePathname(pathname: string): string | null {
  try {
    return decodeURIComponent(pathname);
  } catch {
    return null;
  }
}

async function resolveFile(filePath: string): Promise<string | null> {
  try {
    const fileStat = await stat(filePath);
    if (fileStat.isFile()) return filePath;
    if (fileStat.isDirectory()) {
      const indexPath = join(filePath, OUTPUT_FILE);
      const indexStat = await stat(indexPath);
      return indexStat.isFile() ? indexPath : null;
    }
  } catch {
    // Missing path: reported as 404 by the caller
  }
  return null;
}

export async function handleStaticRoutes(
  req: IncomingMessage,
  res: ServerResponse,
  url: URL,
  rootDir: string,
): Promise<boolean> {
  const pathname = decodePathname(url.pathname);
  if (pathname === null) {
    sendError(res, 'Malformed path', 400);
    return true;
  }

  const requested = safePath(rootDir, pathname === '/' ? OUTPUT_FILE : pathname);
  if (!requested) {
    sendError(res, 'Forbidden', 403);
    return true;
  }

  const filePath = await resolveFile(requested);
  if (!filePath) return false;

  const content = await readFile(filePath);
  const contentType = MIME_TYPES[extname(filePath).toLowerCase()] ?? 'application/octet-stream';
  res.writeHead(200, {
    'Content-Type': contentType,
    'Content-Length': content.length,
    'Cache-Control': 'no-cache',
  });
  res.end(req.method === 'HEAD' ? undefined : content);
  return true;
}
