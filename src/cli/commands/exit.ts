import type { Command } from 'commander';
import { runOnSession } from '../options.js';

/** 註冊 exit 指令：要求 IGV 關閉 */
export function registerExitCommand(program: Command): void {
  program
    .command('exit')
    .alias('quit')
    .description('Ask IGV to exit')
    .action(async (_opts: unknown, cmd: Command) => {
      // IGV 收到 exit 後通常不回應就關閉連線，不算失敗
      await runOnSession(cmd, 'exit', (igv) => igv.exit(), { allowNoResponse: true });
    });
}
