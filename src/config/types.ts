import type { LogLevel } from '../shared/Logger.js';

/** IGV batch port 連線設定 */
export interface ConnectionConfig {
  host: string;
  port: number;
  /** 建立 TCP 連線的逾時（毫秒） */
  connectTimeoutMs: number;
}

/** 啟動 IGV 子行程的設定 */
export interface LaunchConfig {
  /** IGV 執行檔名稱或路徑 */
  command: string;
  extraArgs: string[];
  /** 啟動前探測 port 是否已被占用 */
  probePort: boolean;
  /** 等待 ready 訊息的逾時；未設定則無限等待 */
  readyTimeoutMs?: number;
}

export interface SnapshotConfig {
  /** 開啟 session 時同步給 IGV 的 snapshot 目錄 */
  dir?: string;
}

export interface LogConfig {
  level: LogLevel;
}

/** 完整設定 */
export interface IgvctlConfig {
  version: number;
  connection: ConnectionConfig;
  launch: LaunchConfig;
  snapshot: SnapshotConfig;
  log: LogConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  version?: number;
  connection?: Partial<ConnectionConfig>;
  launch?: Partial<LaunchConfig>;
  snapshot?: Partial<SnapshotConfig>;
  log?: Partial<LogConfig>;
};
