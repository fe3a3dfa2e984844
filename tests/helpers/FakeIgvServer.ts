import net from 'node:net';

/**
 * 測試用的 IGV batch port
 *
 * - echo 無參數回 "echo"，有參數回傳參數本身
 * - exit 回 OK 後關閉連線
 * - 其他指令一律回 OK，或由 respond 自訂
 * - silent 中的指令不回應並直接關閉連線
 * - ignore 中的指令不回應，連線保持開啟
 */
export interface FakeIgvServerOptions {
  respond?: (line: string) => string | undefined;
  silent?: readonly string[];
  ignore?: readonly string[];
}

export class FakeIgvServer {
  readonly received: string[] = [];
  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();

  constructor(private readonly options: FakeIgvServerOptions = {}) {
    this.server = net.createServer((socket) => this.accept(socket));
  }

  get port(): number {
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('FakeIgvServer is not listening');
    }
    return address.port;
  }

  /** 目前仍開著的 client 連線數 */
  get connectionCount(): number {
    return this.sockets.size;
  }

  listen(): Promise<void> {
    return new Promise((resolve) => {
      this.server.listen(0, '127.0.0.1', () => resolve());
    });
  }

  close(): Promise<void> {
    for (const socket of this.sockets) socket.destroy();
    return new Promise((resolve) => {
      this.server.close(() => resolve());
    });
  }

  private accept(socket: net.Socket): void {
    this.sockets.add(socket);
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', () => socket.destroy());
    socket.setEncoding('utf8');

    let buffer = '';
    socket.on('data', (chunk: string) => {
      buffer += chunk;
      let newline = buffer.indexOf('\n');
      while (newline !== -1) {
        const line = buffer.slice(0, newline);
        buffer = buffer.slice(newline + 1);
        this.handle(socket, line);
        newline = buffer.indexOf('\n');
      }
    });
  }

  private handle(socket: net.Socket, line: string): void {
    this.received.push(line);
    const [name = '', ...args] = line.split(' ');

    if (this.options.silent?.includes(name)) {
      socket.end();
      return;
    }
    if (this.options.ignore?.includes(name)) return;
    if (name === 'exit') {
      socket.end('OK\n');
      return;
    }

    const custom = this.options.respond?.(line);
    if (custom !== undefined) {
      socket.write(custom + '\n');
    } else if (name === 'echo') {
      socket.write((args.length === 0 ? 'echo' : args.join(' ')) + '\n');
    } else {
      socket.write('OK\n');
    }
  }
}
