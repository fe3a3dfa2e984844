import type { Command } from 'commander';
import { z } from 'zod';
import { IgvSession } from '../../application/IgvSession.js';
import { IgvProcessLauncher } from '../../infrastructure/process/IgvProcessLauncher.js';
import { ResponseFormatter } from '../formatters/ResponseFormatter.js';
import { loadCliConfig, numeric, parseOptions, readGlobalOptions } from '../options.js';

const StartOptionsSchema = z.object({
  command: z.string().optional(),
  snapshotDir: z.string().optional(),
  readyTimeout: numeric('--ready-timeout').optional(),
  probePort: z.boolean().default(true),
  igvArg: z.array(z.string()).optional(),
});

/**
 * 註冊 start / stop 指令
 *
 * start 啟動 IGV 後立即關閉 socket 並結束，IGV 繼續執行；
 * 輸出的 processGroupId 交給 stop 使用。
 */
export function registerStartCommand(program: Command): void {
  program
    .command('start')
    .description('Launch IGV listening on the batch port and wait until it is ready')
    .option('--command <path>', 'IGV executable')
    .option('--snapshot-dir <dir>', 'Snapshot directory to set once IGV is ready')
    .option('--ready-timeout <ms>', 'Give up if IGV is not ready in time (default: wait forever)')
    .option('--no-probe-port', 'Skip checking whether the port is already in use')
    .option('--igv-arg <arg...>', 'Extra arguments passed to IGV')
    .action(async (_opts: unknown, cmd: Command) => {
      const opts = readGlobalOptions(cmd);
      const local = parseOptions(StartOptionsSchema, cmd.opts());
      const config = loadCliConfig(opts, {
        launch: {
          command: local.command,
          readyTimeoutMs: local.readyTimeout,
          probePort: local.probePort ? undefined : false,
          extraArgs: local.igvArg,
        },
        snapshot: { dir: local.snapshotDir },
      });
      const formatter = new ResponseFormatter();

      const igv = await IgvSession.start({
        host: config.connection.host,
        port: config.connection.port,
        connectTimeoutMs: config.connection.connectTimeoutMs,
        snapshotDir: config.snapshot.dir,
        command: config.launch.command,
        extraArgs: config.launch.extraArgs,
        probePort: config.launch.probePort,
        readyTimeoutMs: config.launch.readyTimeoutMs,
      });

      const summary = {
        processGroupId: igv.processGroupId,
        host: igv.host,
        port: igv.port,
        snapshotDir: igv.snapshotDir,
      };
      igv.close();

      process.stdout.write(formatter.formatObject(summary, opts.format) + '\n');
    });

  program
    .command('stop')
    .description('Terminate an IGV process group started by "igvctl start"')
    .argument('<processGroupId>', 'Process group id printed by start')
    .action(async (groupId: string, _opts: unknown, cmd: Command) => {
      loadCliConfig(readGlobalOptions(cmd));
      const { processGroupId } = parseOptions(
        z.object({ processGroupId: numeric('processGroupId') }),
        { processGroupId: groupId },
      );

      const stopped = new IgvProcessLauncher().terminate(processGroupId);
      process.stdout.write(
        stopped
          ? `Sent SIGTERM to process group ${processGroupId}\n`
          : `Process group ${processGroupId} is not running\n`,
      );
      if (!stopped) process.exitCode = 1;
    });
}
