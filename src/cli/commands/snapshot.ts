import type { Command } from 'commander';
import { runOnSession } from '../options.js';

/** 註冊 snapshot 指令 */
export function registerSnapshotCommand(program: Command): void {
  program
    .command('snapshot')
    .alias('save')
    .description('Save an image of the current view, optionally to the given path')
    .argument('[file]', 'Image file path (.png or .svg)')
    .action(async (file: string | undefined, _opts: unknown, cmd: Command) => {
      await runOnSession(cmd, 'snapshot', (igv) => igv.snapshot(file));
    });
}
