import type { ProcessRecord } from '../entities/ProcessRecord.js';

export interface LaunchOptions {
  /** IGV 執行檔名稱或路徑 */
  command: string;
  port: number;
  /** preflight 探測用的 host */
  host?: string;
  /** 附加在 --port 之後的額外參數 */
  extraArgs?: readonly string[];
  /** 啟動前先探測 port 是否已被占用（預設 true） */
  probePort?: boolean;
  /** 未設定時無限等待 ready 訊息 */
  readyTimeoutMs?: number;
  cwd?: string;
}

export interface ProcessLauncherPort {
  /** 啟動 IGV 並等到 "Listening on port <port>" 出現才 resolve */
  launch(options: LaunchOptions): Promise<ProcessRecord>;

  /**
   * 對整個 process group 送出訊號
   * @returns false 表示該 group 已不存在
   */
  terminate(processGroupId: number, signal?: NodeJS.Signals): boolean;
}
