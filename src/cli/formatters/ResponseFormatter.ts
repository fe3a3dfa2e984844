import type { IgvResponse } from '../../application/IgvSession.js';

export type OutputFormat = 'json' | 'text';

export const NO_RESPONSE_TEXT = '(no response: IGV closed the connection)';

/**
 * CLI 輸出格式化
 *
 * - text：IGV 回應原樣輸出，一行一個
 * - json：{ command, response }，沒有回應時 response 為 null
 */
export class ResponseFormatter {
  formatResponse(command: string, response: IgvResponse | undefined, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify({ command, response: response ?? null }, null, 2);
    }
    if (response === undefined) return `${command}: skipped (unchanged)`;
    return response ?? NO_RESPONSE_TEXT;
  }

  formatObject(data: unknown, format: OutputFormat): string {
    if (format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${val ?? ''}`;
      })
      .join('\n');
  }
}
