import http from 'http';
import { logger } from '../../shared/logger.js';
import type express from 'express';

/**
 * Bind the app and resolve once it is accepting connections
 */
export const listen = (app: express.Express, host: string, port: number): Promise<http.Server> => {
  const server = http.createServer(app);

  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(port, host, () => {
      server.off('error', reject);
      const address = server.address();
      logger().info('Server started', {
        host,
        port: typeof address === 'object' && address ? address.port : port,
      });
      resolve(server);
    });
  });
};

export const close = (server: http.Server): Promise<void> =>
  new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
