import type { Command } from 'commander';
import fs from 'node:fs';
import { IgvSession } from '../../application/IgvSession.js';
import { BatchScriptUseCase } from '../../application/BatchScriptUseCase.js';
import { ResponseFormatter, NO_RESPONSE_TEXT } from '../formatters/ResponseFormatter.js';
import { loadCliConfig, readGlobalOptions, sessionOptions } from '../options.js';

/**
 * 註冊 batch 指令
 *
 * 用法：
 *   igvctl batch script.txt
 */
export function registerBatchCommand(program: Command): void {
  program
    .command('batch')
    .description('Run an IGV batch script (one command per line, # for comments)')
    .argument('<file>', 'Batch script path')
    .action(async (file: string, _opts: unknown, cmd: Command) => {
      const opts = readGlobalOptions(cmd);
      const config = loadCliConfig(opts);
      const formatter = new ResponseFormatter();
      const script = fs.readFileSync(file, 'utf-8');

      const results = await IgvSession.use(
        sessionOptions(config),
        (igv) => new BatchScriptUseCase(igv).run(script),
      );

      if (opts.format === 'json') {
        process.stdout.write(formatter.formatObject(results, 'json') + '\n');
      } else {
        for (const { command, response } of results) {
          process.stdout.write(`${command} -> ${response ?? NO_RESPONSE_TEXT}\n`);
        }
      }

      const unanswered = results.some(
        ({ command, response }) => response === null && command !== 'exit',
      );
      if (unanswered) process.exitCode = 1;
    });
}
