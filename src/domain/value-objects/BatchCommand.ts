import { InvalidArgumentError } from '../errors/DomainErrors.js';
import { toArgumentText } from './CommandArgument.js';

/**
 * 一行 IGV batch 指令（不可變）
 *
 * 指令名稱大小寫敏感，必須與 IGV 的拼法一致（例如 snapshotDirectory）。
 * 參數依序以單一空白連接，省略的參數不會留下空 token。
 */
export class BatchCommand {
  private constructor(
    public readonly name: string,
    public readonly args: readonly string[],
  ) {}

  /** 建立指令；任何不合法的參數在這裡就拋出，不會碰到網路 */
  static of(name: string, ...args: readonly unknown[]): BatchCommand {
    const trimmedName = name.trim();
    if (trimmedName === '' || /\s/.test(trimmedName)) {
      throw new InvalidArgumentError(`Invalid command name ${JSON.stringify(name)}`);
    }

    const texts: string[] = [];
    for (const arg of args) {
      const text = toArgumentText(arg);
      if (text !== undefined) texts.push(text);
    }
    return new BatchCommand(trimmedName, texts);
  }

  /** 解析 batch script 中的一行：第一個 token 是指令，其餘為參數 */
  static parseLine(line: string): BatchCommand {
    const [name = '', ...args] = line.trim().split(/\s+/);
    return BatchCommand.of(name, ...args);
  }

  toLine(): string {
    return [this.name, ...this.args].join(' ').trim();
  }

  toString(): string {
    return this.toLine();
  }
}
