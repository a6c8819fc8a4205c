export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3,
};

/** 全域預設等級；由 CLI 啟動時依設定呼叫 setDefaultLogLevel 調整 */
let defaultLevel: LogLevel = parseLogLevel(process.env.PAGEWISE_LOG_LEVEL) ?? 'info';

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) return undefined;
  const lowered = value.toLowerCase();
  return isLogLevel(lowered) ? lowered : undefined;
}

export function setDefaultLogLevel(level: LogLevel): void {
  defaultLevel = level;
}

/**
 * 結構化 JSON logger
 * 一律寫到 stderr，stdout 保留給 CLI 輸出與 MCP stdio transport
 */
export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel?: LogLevel,
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel ?? defaultLevel];
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
    process.stderr.write(JSON.stringify(entry) + '\n');
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}

/** 將未知錯誤轉為可記錄的訊息字串 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return typeof err === 'string' ? err : 'unknown error';
}
