import { BatchCommand } from '../domain/value-objects/BatchCommand.js';
import type { IgvResponse, IgvSession } from './IgvSession.js';

export interface BatchStepResult {
  /** 正規化後送出的指令 */
  command: string;
  response: IgvResponse | undefined;
}

/**
 * 執行 IGV batch script（一行一個指令）
 *
 * - 空行與 # 開頭的註解行略過
 * - 全部行先解析，任何一行不合法就在送出前拋出
 * - snapshotDirectory 經由 setSnapshotDir 送出，讓 session 的快取保持一致
 * - exit 經由 session.exit() 送出，socket 會一併關閉
 */
export class BatchScriptUseCase {
  constructor(private readonly session: IgvSession) {}

  static parse(script: string): BatchCommand[] {
    return script
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== '' && !line.startsWith('#'))
      .map((line) => BatchCommand.parseLine(line));
  }

  async run(script: string): Promise<BatchStepResult[]> {
    const commands = BatchScriptUseCase.parse(script);
    const results: BatchStepResult[] = [];

    for (const command of commands) {
      const response = await this.execute(command);
      results.push({ command: command.toLine(), response });
      if (command.name === 'exit') break;
    }
    return results;
  }

  private execute(command: BatchCommand): Promise<IgvResponse | undefined> {
    const [first, ...rest] = command.args;

    if (command.name === 'snapshotDirectory' && first !== undefined && rest.length === 0) {
      return this.session.setSnapshotDir(first, { force: true });
    }
    if (command.name === 'exit') {
      return this.session.exit();
    }
    return this.session.send(command.name, ...command.args);
  }
}
