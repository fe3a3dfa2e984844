#!/usr/bin/env node

import { createRequire } from 'node:module';
import { Command } from 'commander';
import { registerStartCommand } from './commands/start.js';
import { registerSendCommand } from './commands/send.js';
import { registerViewCommands } from './commands/view.js';
import { registerSnapshotCommand } from './commands/snapshot.js';
import { registerBatchCommand } from './commands/batch.js';
import { registerExitCommand } from './commands/exit.js';
import { registerMcpCommand } from './commands/mcp.js';

// 從 package.json 動態讀取版本號，避免硬編碼導致版本不同步
const require = createRequire(import.meta.url);
const { version } = require('../../package.json') as { version: string };

const program = new Command();

program
  .name('igvctl')
  .description('Drive IGV through its batch command port')
  .version(version)
  .option('--host <host>', 'IGV host (default 127.0.0.1)')
  .option('--port <number>', 'IGV batch port (default 60151)')
  .option('--format <format>', 'Output format: json or text', 'text');

registerStartCommand(program);
registerSendCommand(program);
registerViewCommands(program);
registerSnapshotCommand(program);
registerBatchCommand(program);
registerExitCommand(program);
registerMcpCommand(program);

/** 全域錯誤處理 */
program.exitOverride();

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

async function main(): Promise<void> {
  try {
    await program.parseAsync(process.argv);
  } catch (err: unknown) {
    const code = errorCode(err);
    if (code === 'commander.helpDisplayed' || code === 'commander.version') {
      process.exit(0);
    }
    const message = err instanceof Error ? err.message : 'Unknown error';
    process.stderr.write(`Error: ${message}\n`);
    process.exit(1);
  }
}

void main();
