/** 由 launcher 啟動的 IGV 行程；client 不會 wait / reap 它 */
export interface ProcessRecord {
  pid: number;
  /** detached 子行程自成一個 group，group id 等於其 pid */
  processGroupId: number;
  port: number;
  command: string;
}
