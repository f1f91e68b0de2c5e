/**
 * HTTP server factory — method gate, static dispatch, JSON 404.
 */

import { createServer, type Server } from 'http';
import { resolve } from 'path';
import { errorMessage } from '../errors.js';
import { handleStaticRoutes } from './routes/static.js';
import { sendError } from './utils.js';

export interface HttpServerOptions {
  /** Directory served at `/`, normally the deck directory. */
  rootDir: string;
}

export function createHttpServer({ rootDir }: HttpServerOptions): Server {
  const root = resolve(rootDir);

  return createServer(async (req, res) => {
    if (req.method !== 'GET' && req.method !== 'HEAD') {
      res.setHeader('Allow', 'GET, HEAD');
      sendError(res, 'Method not allowed', 405);
      return;
    }

    const url = new URL(req.url ?? '/', 'http://localhost');

    try {
      if (await handleStaticRoutes(req, res, url, root)) return;
      sendError(res, 'Not found', 404);
    } catch (err) {
      console.error(`[http] Failed to serve ${url.pathname}: ${errorMessage(err)}`);
      if (!res.headersSent) {
        sendError(res, 'Internal server error', 500);
      } else {
        res.end();
      }
    }
  });
}
