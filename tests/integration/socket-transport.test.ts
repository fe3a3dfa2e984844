import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { SocketTransport } from '../../src/infrastructure/socket/SocketTransport.js';
import { ConnectionError, NotConnectedError } from '../../src/domain/errors/DomainErrors.js';
import { FakeIgvServer } from '../helpers/FakeIgvServer.js';

/**
 * Feature: Socket 傳輸
 *
 * 作為 session，我需要在一條 TCP 連線上寫出一行、讀回一行，
 * 並在對方關閉時得到 null 而不是一直等待。
 */
describe('SocketTransport', () => {
  let server: FakeIgvServer;
  let transport: SocketTransport;

  beforeEach(async () => {
    server = new FakeIgvServer({
      silent: ['snapshot'],
      respond: (line) => (line === 'crlf' ? 'OK\r' : undefined),
    });
    await server.listen();
    transport = new SocketTransport();
  });

  afterEach(async () => {
    transport.close();
    await server.close();
  });

  it('should exchange one line per request', async () => {
    await transport.connect('127.0.0.1', server.port);

    await expect(transport.request('echo')).resolves.toBe('echo');
    await expect(transport.request('goto chr1')).resolves.toBe('OK');
    expect(server.received).toEqual(['echo', 'goto chr1']);
  });

  it('should strip a trailing carriage return', async () => {
    await transport.connect('127.0.0.1', server.port);
    await expect(transport.request('crlf')).resolves.toBe('OK');
  });

  /**
   * Scenario: 並行請求
   * Given 同時送出三個請求
   * When 等待全部完成
   * Then 依呼叫順序寫出，每個請求拿到自己的回應
   */
  it('should serialize concurrent requests', async () => {
    await transport.connect('127.0.0.1', server.port);

    const responses = await Promise.all([
      transport.request('echo one'),
      transport.request('echo two'),
      transport.request('echo three'),
    ]);

    expect(responses).toEqual(['one', 'two', 'three']);
    expect(server.received).toEqual(['echo one', 'echo two', 'echo three']);
  });

  /**
   * Scenario: 對方未回應就關閉
   * Given IGV 收到指令後直接關閉連線
   * When request
   * Then 回傳 null，transport 變為已關閉
   */
  it('should resolve null when the peer closes without responding', async () => {
    await transport.connect('127.0.0.1', server.port);

    await expect(transport.request('snapshot')).resolves.toBeNull();
    expect(transport.isClosed()).toBe(true);
    await expect(transport.request('echo')).rejects.toThrow(NotConnectedError);
  });

  /**
   * Scenario: 同時呼叫 connect
   * Given 兩個 connect 同時進行
   * When 兩者都完成
   * Then 只留下一條連線，且可以正常收發
   */
  it('should keep a single socket when connects overlap', async () => {
    await Promise.all([
      transport.connect('127.0.0.1', server.port),
      transport.connect('127.0.0.1', server.port),
    ]);

    await vi.waitFor(() => expect(server.connectionCount).toBe(1));
    await expect(transport.request('echo')).resolves.toBe('echo');
  });

  it('should reject requests before connect', async () => {
    expect(transport.isClosed()).toBe(true);
    await expect(transport.request('echo')).rejects.toThrow(NotConnectedError);
  });

  it('should reject with ConnectionError when nothing listens', async () => {
    const port = server.port;
    await server.close();

    const result = transport.connect('127.0.0.1', port);
    await expect(result).rejects.toThrow(ConnectionError);
    await expect(result).rejects.toThrow(`Cannot connect to IGV at 127.0.0.1:${port}`);
  });

  it('should settle a pending request with null on close', async () => {
    const quiet = new FakeIgvServer({ ignore: ['goto'] });
    await quiet.listen();
    try {
      await transport.connect('127.0.0.1', quiet.port);
      await transport.request('echo');

      const pending = transport.request('goto chr1');
      await vi.waitFor(() => expect(quiet.received).toEqual(['echo', 'goto chr1']));
      transport.close();
      transport.close();

      await expect(pending).resolves.toBeNull();
      expect(transport.isClosed()).toBe(true);
    } finally {
      await quiet.close();
    }
  });
});
