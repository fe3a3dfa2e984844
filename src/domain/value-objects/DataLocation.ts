import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

/**
 * 判斷字串是否為帶 scheme 的 URL（http://、s3://、gs:// ...）
 *
 * 單一字母的 scheme 視為 Windows 磁碟代號而非 URL。
 * 解析失敗的字串一律當作本機路徑。
 */
export function hasUrlScheme(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol.length > 2;
  } catch {
    return false;
  }
}

/** 展開 ~ 並轉為絕對路徑 */
export function expandPath(value: string, cwd: string = process.cwd()): string {
  if (value === '~') return os.homedir();
  if (value.startsWith('~/')) return path.join(os.homedir(), value.slice(2));
  return path.resolve(cwd, value);
}

/** load / saveSession 使用：URL 原樣送出，其餘展開為絕對路徑 */
export function resolveLocation(value: string, cwd?: string): string {
  return hasUrlScheme(value) ? value : expandPath(value, cwd);
}

/**
 * genome 使用：磁碟上存在的檔案送絕對路徑，
 * 否則視為 IGV 內建的 genome id（例如 hg19）原樣送出。
 */
export function resolveGenome(
  value: string,
  exists: (p: string) => boolean = fs.existsSync,
  cwd?: string,
): string {
  const absolute = expandPath(value, cwd);
  return exists(absolute) ? absolute : value;
}
