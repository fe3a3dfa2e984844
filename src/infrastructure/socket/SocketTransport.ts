import net from 'node:net';
import type { TransportPort } from '../../domain/ports/TransportPort.js';
import { ConnectionError, NotConnectedError } from '../../domain/errors/DomainErrors.js';
import { Logger } from '../../shared/Logger.js';

interface PendingRequest {
  resolve: (line: string | null) => void;
  reject: (err: Error) => void;
}

/** 建立 TCP 連線；timeoutMs 未指定時交給 OS 決定 */
function openSocket(host: string, port: number, timeoutMs?: number): Promise<net.Socket> {
  return new Promise((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    let timer: NodeJS.Timeout | undefined;

    const fail = (err: Error): void => {
      if (timer) clearTimeout(timer);
      socket.destroy();
      reject(new ConnectionError(`Cannot connect to IGV at ${host}:${port}: ${err.message}`, { cause: err }));
    };

    if (timeoutMs !== undefined) {
      timer = setTimeout(() => fail(new Error(`timed out after ${timeoutMs} ms`)), timeoutMs);
    }

    socket.once('error', fail);
    socket.once('connect', () => {
      if (timer) clearTimeout(timer);
      socket.removeListener('error', fail);
      resolve(socket);
    });
  });
}

/**
 * TCP 傳輸：IGV batch port 的一問一答
 *
 * 同一條連線上同時只會有一個請求在等待回應；
 * 並行呼叫 request() 會排隊，依序寫出，不做 pipelining。
 */
export class SocketTransport implements TransportPort {
  private socket: net.Socket | null = null;
  private buffer = '';
  private ended = false;
  private pending: PendingRequest | null = null;
  private tail: Promise<unknown> = Promise.resolve();
  private readonly logger = new Logger('SocketTransport');

  async connect(host: string, port: number, timeoutMs?: number): Promise<void> {
    this.close();
    const socket = await openSocket(host, port, timeoutMs);
    // 等待期間另一個 connect 可能已經 attach，先關掉它才接上新的
    this.close();
    this.attach(socket);
    this.logger.debug('Connected to IGV', { host, port });
  }

  request(line: string): Promise<string | null> {
    const result = this.tail.then(() => this.exchange(line));
    this.tail = result.catch(() => undefined);
    return result;
  }

  close(): void {
    const socket = this.socket;
    this.socket = null;
    this.buffer = '';
    this.ended = true;
    socket?.destroy();
    // close 之後 socket 事件不再處理，等待中的請求在這裡結束
    this.settle(null);
  }

  isClosed(): boolean {
    return this.socket === null || this.socket.destroyed || this.ended;
  }

  private attach(socket: net.Socket): void {
    this.socket = socket;
    this.buffer = '';
    this.ended = false;
    socket.setEncoding('utf8');
    socket.setNoDelay(true);

    socket.on('data', (chunk: string) => {
      if (this.socket !== socket) return;
      this.buffer += chunk;
      this.flush();
    });

    const onEnd = (): void => {
      if (this.socket !== socket) return;
      this.ended = true;
      this.settle(null);
    };
    socket.on('end', onEnd);
    socket.on('close', onEnd);

    socket.on('error', (err: Error) => {
      if (this.socket !== socket) return;
      this.logger.warn('Socket error', { error: err.message });
      this.ended = true;
      this.fail(new ConnectionError(`Connection to IGV failed: ${err.message}`, { cause: err }));
    });
  }

  private exchange(line: string): Promise<string | null> {
    const socket = this.socket;
    if (!socket || socket.destroyed || this.ended || !socket.writable) {
      return Promise.reject(new NotConnectedError());
    }

    return new Promise((resolve, reject) => {
      this.pending = { resolve, reject };
      socket.write(line + '\n', 'utf8', (err) => {
        if (err) this.fail(new ConnectionError(`Failed to write to IGV: ${err.message}`, { cause: err }));
      });
      this.flush();
    });
  }

  /** 緩衝區中若已有完整一行，交給等待中的請求 */
  private flush(): void {
    if (!this.pending) return;
    const newline = this.buffer.indexOf('\n');
    if (newline === -1) return;

    const line = this.buffer.slice(0, newline).replace(/\r$/, '');
    this.buffer = this.buffer.slice(newline + 1);
    this.settle(line);
  }

  private settle(line: string | null): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    pending.resolve(line);
  }

  private fail(err: Error): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    pending.reject(err);
  }
}
