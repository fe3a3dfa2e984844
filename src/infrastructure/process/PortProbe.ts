import net from 'node:net';

/** in-use：有程式在 listen；free：連線被拒；unknown：無法判斷（逾時、不可達等） */
export type PortStatus = 'in-use' | 'free' | 'unknown';

export type PortProbe = (port: number, host?: string) => Promise<PortStatus>;

/** 以一次 TCP 連線嘗試判斷 port 是否已被占用，不會拋出 */
export function probePort(
  port: number,
  host: string = '127.0.0.1',
  timeoutMs: number = 1000,
): Promise<PortStatus> {
  return new Promise((resolve) => {
    const socket = net.createConnection({ host, port });

    const done = (status: PortStatus): void => {
      clearTimeout(timer);
      socket.destroy();
      resolve(status);
    };

    const timer = setTimeout(() => done('unknown'), timeoutMs);
    socket.once('connect', () => done('in-use'));
    socket.once('error', (err: NodeJS.ErrnoException) => {
      done(err.code === 'ECONNREFUSED' ? 'free' : 'unknown');
    });
  });
}
