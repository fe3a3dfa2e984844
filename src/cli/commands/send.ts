import type { Command } from 'commander';
import { runOnSession } from '../options.js';

/** 註冊 send / echo 指令 */
export function registerSendCommand(program: Command): void {
  program
    .command('send')
    .description('Send a raw batch command, e.g. "igvctl send setSleepInterval 200"')
    .argument('<words...>', 'Command name followed by its arguments')
    .action(async (words: string[], _opts: unknown, cmd: Command) => {
      const [name = '', ...args] = words;
      await runOnSession(cmd, words.join(' '), (igv) => igv.send(name, ...args));
    });

  program
    .command('echo')
    .description('Check that IGV answers; prints the text back (or "echo")')
    .argument('[text]', 'Text for IGV to echo')
    .action(async (text: string | undefined, _opts: unknown, cmd: Command) => {
      await runOnSession(cmd, 'echo', (igv) => igv.echo(text));
    });
}
