import { describe, it, expect, afterEach } from 'vitest';
import net from 'node:net';
import { probePort } from '../../../src/infrastructure/process/PortProbe.js';

function listen(server: net.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('no TCP address'));
        return;
      }
      resolve(address.port);
    });
  });
}

function close(server: net.Server): Promise<void> {
  return new Promise((resolve) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close(() => resolve());
  });
}

describe('probePort', () => {
  const servers: net.Server[] = [];

  afterEach(async () => {
    await Promise.all(servers.map(close));
    servers.length = 0;
  });

  it('should report in-use when something is listening', async () => {
    const server = net.createServer((socket) => socket.destroy());
    servers.push(server);
    const port = await listen(server);

    await expect(probePort(port)).resolves.toBe('in-use');
  });

  it('should report free when the connection is refused', async () => {
    const server = net.createServer();
    const port = await listen(server);
    await close(server);

    await expect(probePort(port)).resolves.toBe('free');
  });
});
