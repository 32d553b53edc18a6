/**
 * Port Allocator
 *
 * Picks a random free host port inside the configured range for a preview
 * container to publish on.
 */

import { createServer } from 'net';
import { logger as getLogger } from '../../shared/logger.js';
import { ProvisionerTransientError } from '../preview/errors.js';

const logger = getLogger();

const MAX_RETRIES = 10;

export interface PortRange {
  minPort: number;
  maxPort: number;
}

export type PortProbe = (port: number, host: string) => Promise<boolean>;

/**
 * Check if a port can be bound on the given host
 */
export function isPortAvailable(port: number, host: string): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer();

    server.once('error', () => {
      resolve(false);
    });

    server.once('listening', () => {
      server.close(() => resolve(true));
    });

    server.listen(port, host);
  });
}

function randomPort({ minPort, maxPort }: PortRange): number {
  return Math.floor(Math.random() * (maxPort - minPort + 1)) + minPort;
}

export class PortAllocator {
  private range: PortRange;

  private host: string;

  private probe: PortProbe;

  constructor(range: PortRange, host = '127.0.0.1', probe: PortProbe = isPortAvailable) {
    this.range = range;
    this.host = host;
    this.probe = probe;
  }

  /**
   * Find an available port, retrying a few random picks
   */
  async allocate(): Promise<number> {
    for (let i = 0; i < MAX_RETRIES; i += 1) {
      const port = randomPort(this.range);
      // eslint-disable-next-line no-await-in-loop
      if (await this.probe(port, this.host)) {
        logger.debug('Allocated port', { port });
        return port;
      }
    }
    throw new ProvisionerTransientError(`Failed to find available port after ${MAX_RETRIES} attempts`);
  }
}
