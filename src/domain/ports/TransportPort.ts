/**
 * IGV batch port 的傳輸抽象
 *
 * 一條連線、一問一答：寫出一行，讀回一行。
 * IgvSession 只依賴此介面，測試時以 spy transport 取代 socket。
 */
export interface TransportPort {
  /** 關閉既有連線後建立新連線；失敗時拋出 ConnectionError */
  connect(host: string, port: number, timeoutMs?: number): Promise<void>;

  /**
   * 送出一行並等待一行回應（已去除行尾換行）
   * @returns 回應文字；對方在完整一行之前關閉串流時回傳 null
   */
  request(line: string): Promise<string | null>;

  /** 可重複呼叫，不會拋出 */
  close(): void;

  /** 從未連線、已關閉或對方已結束串流時為 true */
  isClosed(): boolean;
}
