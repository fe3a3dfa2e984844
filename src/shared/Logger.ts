export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** 行程層級的預設等級：IGVCTL_LOG_LEVEL 優先，其次 setDefaultLogLevel() */
let defaultLevel: LogLevel = 'info';

export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

function resolveDefaultLevel(): LogLevel {
  const fromEnv = process.env.IGVCTL_LOG_LEVEL;
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return defaultLevel;
}

export type LogSink = (line: string) => void;

const stderrSink: LogSink = (line) => {
  process.stderr.write(line + '\n');
};

/**
 * 結構化 JSON logger
 *
 * 一律寫到 stderr，stdout 留給 CLI 輸出 IGV 的回應。
 * minLevel 未指定時，每次寫入都重新讀取預設等級。
 */
export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel?: LogLevel,
    private readonly sink: LogSink = stderrSink,
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel ?? resolveDefaultLevel()];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...data,
    };
    this.sink(JSON.stringify(entry));
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}
