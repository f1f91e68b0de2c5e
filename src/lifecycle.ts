/**
 * Server lifecycle — listening, shutdown.
 */

import type { Server } from 'http';
import type { AddressInfo } from 'net';
import { errorMessage, ListenError } from './errors.js';

function describeListenError(err: NodeJS.ErrnoException, port: number, host: string): string {
  switch (err.code) {
    case 'EADDRINUSE':
      return `Port ${port} is already in use on ${host}`;
    case 'EACCES':
      return `Permission denied binding to ${host}:${port}`;
    default:
      return `Could not listen on ${host}:${port}: ${err.message}`;
  }
}

/** Resolves with the bound port once the server is listening. */
export function startListening(server: Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    const onError = (err: NodeJS.ErrnoException) => {
      server.off('listening', onListening);
      reject(new ListenError(describeListenError(err, port, host), err.code));
    };
    const onListening = () => {
      server.off('error', onError);
      const address = server.address();
      resolve(isAddressInfo(address) ? address.port : port);
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return address !== null && typeof address === 'object';
}

export function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close((err) => (err ? reject(err) : resolve()));
    server.closeAllConnections();
  });
}

export interface ShutdownTarget {
  close(): Promise<void>;
}

/**
 * Stop every target in order, then close the HTTP server. Each step's
 * failure is reported and the rest still run.
 */
export async function shutdown(server: Server, targets: ShutdownTarget[]): Promise<void> {
  console.log('\nShutting down...');
  for (const target of targets) {
    try {
      await target.close();
    } catch (err) {
      console.error(`[serve] Shutdown step failed: ${errorMessage(err)}`);
    }
  }
  await closeServer(server);
}
