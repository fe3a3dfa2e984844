import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from './defaults.js';
import { LOG_LEVELS, isLogLevel } from '../shared/Logger.js';
import type { IgvctlConfig, PartialConfig } from './types.js';

export type { IgvctlConfig, PartialConfig } from './types.js';

/** .igvctl.json 的結構；未知欄位視為錯誤 */
const FileConfigSchema = z.object({
  version: z.number().int().optional(),
  connection: z.object({
    host: z.string(),
    port: z.number().int(),
    connectTimeoutMs: z.number(),
  }).partial().strict().optional(),
  launch: z.object({
    command: z.string(),
    extraArgs: z.array(z.string()),
    probePort: z.boolean(),
    readyTimeoutMs: z.number(),
  }).partial().strict().optional(),
  snapshot: z.object({
    dir: z.string(),
  }).partial().strict().optional(),
  log: z.object({
    level: z.enum(LOG_LEVELS),
  }).partial().strict().optional(),
}).strict();

/** partial 中有值的欄位覆蓋 base */
function merge(base: IgvctlConfig, partial: PartialConfig): IgvctlConfig {
  return {
    version: partial.version ?? base.version,
    connection: {
      host: partial.connection?.host ?? base.connection.host,
      port: partial.connection?.port ?? base.connection.port,
      connectTimeoutMs: partial.connection?.connectTimeoutMs ?? base.connection.connectTimeoutMs,
    },
    launch: {
      command: partial.launch?.command ?? base.launch.command,
      extraArgs: partial.launch?.extraArgs ?? base.launch.extraArgs,
      probePort: partial.launch?.probePort ?? base.launch.probePort,
      readyTimeoutMs: partial.launch?.readyTimeoutMs ?? base.launch.readyTimeoutMs,
    },
    snapshot: {
      dir: partial.snapshot?.dir ?? base.snapshot.dir,
    },
    log: {
      level: partial.log?.level ?? base.log.level,
    },
  };
}

/** 環境變數：IGV_HOST、IGV_PORT、IGV_COMMAND、IGV_SNAPSHOT_DIR、IGVCTL_LOG_LEVEL */
function readEnvOverrides(env: NodeJS.ProcessEnv): PartialConfig {
  const overrides: PartialConfig = { connection: {}, launch: {}, snapshot: {}, log: {} };

  if (env.IGV_HOST) overrides.connection = { host: env.IGV_HOST };
  if (env.IGV_PORT) {
    const port = Number(env.IGV_PORT);
    if (!Number.isInteger(port)) {
      throw new Error(`IGV_PORT must be an integer, got "${env.IGV_PORT}"`);
    }
    overrides.connection = { ...overrides.connection, port };
  }
  if (env.IGV_COMMAND) overrides.launch = { command: env.IGV_COMMAND };
  if (env.IGV_SNAPSHOT_DIR) overrides.snapshot = { dir: env.IGV_SNAPSHOT_DIR };

  const level = env.IGVCTL_LOG_LEVEL;
  if (level && isLogLevel(level)) overrides.log = { level };

  return overrides;
}

/** 驗證設定值的合法性 */
function validate(config: IgvctlConfig): void {
  const { port, connectTimeoutMs } = config.connection;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error('port must be an integer between 1 and 65535');
  }
  if (connectTimeoutMs <= 0) {
    throw new Error('connectTimeoutMs must be positive');
  }
  if (config.launch.readyTimeoutMs !== undefined && config.launch.readyTimeoutMs <= 0) {
    throw new Error('readyTimeoutMs must be positive');
  }
  if (config.launch.command.trim() === '') {
    throw new Error('launch command must not be empty');
  }
}

/** 讀取並驗證 .igvctl.json；不存在時回傳空設定 */
function readConfigFile(cwd: string): PartialConfig {
  const configPath = path.join(cwd, CONFIG_FILE_NAME);
  if (!fs.existsSync(configPath)) return {};

  const raw = fs.readFileSync(configPath, 'utf-8');
  const parsed = FileConfigSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid ${CONFIG_FILE_NAME}: ${issues}`);
  }
  return parsed.data;
}

/**
 * 載入設定
 *
 * 合併順序：defaults < .igvctl.json < 環境變數 < overrides。
 * overrides 來自 CLI 旗標或程式碼，優先於環境變數。
 * @param cwd - 尋找 .igvctl.json 的目錄
 */
export function loadConfig(
  cwd: string,
  overrides?: PartialConfig,
  env: NodeJS.ProcessEnv = process.env,
): IgvctlConfig {
  let merged = merge(DEFAULT_CONFIG, readConfigFile(cwd));
  merged = merge(merged, readEnvOverrides(env));
  if (overrides) {
    merged = merge(merged, overrides);
  }

  validate(merged);
  return merged;
}
