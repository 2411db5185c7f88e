/**
 * HTTP server lifecycle
 */

import type { Server } from 'http';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { createApp, type AppDeps } from './app.js';

export { createApp } from './app.js';
export type { AppDeps } from './app.js';

export interface ServerOptions {
  host?: string;
  port?: number;
}

/**
 * Listen on the configured address; resolves once the socket is bound
 */
export function startServer(deps: AppDeps, options: ServerOptions = {}): Promise<Server> {
  const host = options.host ?? config.server.host;
  const port = options.port ?? config.server.port;
  const app = createApp(deps);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);

    server.once('error', reject);
    server.once('listening', () => {
      server.off('error', reject);
      const address = server.address();
      const boundPort = typeof address === 'object' && address ? address.port : port;
      logger.info({ host, port: boundPort }, `API listening on http://${host}:${boundPort}`);
      resolve(server);
    });
  });
}

export function stopServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      logger.info('API server closed');
      resolve();
    });
  });
}
