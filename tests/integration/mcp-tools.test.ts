import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IgvSession } from '../../src/application/IgvSession.js';
import { handleEcho } from '../../src/mcp/tools/EchoTool.js';
import { handleGoto } from '../../src/mcp/tools/GotoTool.js';
import { FakeIgvServer } from '../helpers/FakeIgvServer.js';

/**
 * Feature: MCP tools 對真實 socket
 *
 * 作為 LLM client，我可能同時呼叫多個 tool，
 * 尚未連線的 session 必須只開一條連線並回應每一個呼叫。
 */
describe('MCP tools over TCP', () => {
  let server: FakeIgvServer;
  let session: IgvSession;

  beforeEach(async () => {
    server = new FakeIgvServer();
    await server.listen();
    session = new IgvSession({ port: server.port, snapshotDir: false });
  });

  afterEach(async () => {
    session.close();
    await server.close();
  });

  /**
   * Scenario: 同時呼叫兩個 tool
   * Given 尚未連線的 session
   * When 同時呼叫 igv_echo 與 igv_goto
   * Then 兩個呼叫都得到回應，server 只有一條連線
   */
  it('should answer concurrent calls on a fresh session', async () => {
    const [echo, goto] = await Promise.all([
      handleEcho({ session }, { text: 'ready' }),
      handleGoto({ session }, { loci: ['chr1'] }),
    ]);

    expect(echo).toEqual({ content: [{ type: 'text', text: 'ready' }] });
    expect(goto).toEqual({ content: [{ type: 'text', text: 'OK' }] });
    expect(server.connectionCount).toBe(1);
    expect(server.received).toEqual(['echo ready', 'goto chr1']);
  });
});
