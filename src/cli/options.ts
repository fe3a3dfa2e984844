import type { Command } from 'commander';
import { z } from 'zod';
import { loadConfig, type IgvctlConfig, type PartialConfig } from '../config/ConfigLoader.js';
import { IgvSession, type IgvResponse, type IgvSessionOptions } from '../application/IgvSession.js';
import { setDefaultLogLevel } from '../shared/Logger.js';
import { ResponseFormatter } from './formatters/ResponseFormatter.js';

export const numeric = (name: string) =>
  z.string().regex(/^\d+$/, `${name} must be a non-negative integer`).transform(Number);

const GlobalOptionsSchema = z.object({
  host: z.string().optional(),
  port: numeric('--port').optional(),
  format: z.enum(['json', 'text']).default('text'),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

/** 以 zod 驗證 commander 的選項，錯誤訊息改為一行文字 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, values: unknown): z.output<T> {
  const parsed = schema.safeParse(values);
  if (!parsed.success) {
    throw new Error(parsed.error.issues.map((issue) => issue.message).join('; '));
  }
  return parsed.data;
}

export function readGlobalOptions(cmd: Command): GlobalOptions {
  return parseOptions(GlobalOptionsSchema, cmd.optsWithGlobals());
}

/** 讀取設定並套用 CLI 旗標（旗標優先） */
export function loadCliConfig(opts: GlobalOptions, overrides: PartialConfig = {}): IgvctlConfig {
  const config = loadConfig(process.cwd(), {
    ...overrides,
    connection: { ...overrides.connection, host: opts.host, port: opts.port },
  });
  setDefaultLogLevel(config.log.level);
  return config;
}

/** 只有設定了 snapshot.dir 才會在連線時同步 snapshot 目錄 */
export function sessionOptions(config: IgvctlConfig): IgvSessionOptions {
  return {
    host: config.connection.host,
    port: config.connection.port,
    connectTimeoutMs: config.connection.connectTimeoutMs,
    snapshotDir: config.snapshot.dir ?? false,
  };
}

/**
 * 連上 IGV、執行一個指令並輸出回應
 *
 * IGV 未回應（連線被關閉）時 exit code 為 1，除非 allowNoResponse。
 */
export async function runOnSession(
  cmd: Command,
  label: string,
  run: (igv: IgvSession) => Promise<IgvResponse | undefined>,
  { allowNoResponse = false }: { allowNoResponse?: boolean } = {},
): Promise<void> {
  const opts = readGlobalOptions(cmd);
  const config = loadCliConfig(opts);
  const formatter = new ResponseFormatter();

  const response = await IgvSession.use(sessionOptions(config), run);

  process.stdout.write(formatter.formatResponse(label, response, opts.format) + '\n');
  if (response === null && !allowNoResponse) process.exitCode = 1;
}
