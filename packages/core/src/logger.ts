export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

type LogRecord = {
  ts: string;
  level: LogLevel;
  msg: string;
  [key: string]: unknown;
};

export type LogWriter = (line: string) => void;

export type LoggerOptions = {
  level?: LogLevel;
  format?: LogFormat;
  /** Destination for formatted lines. Default: stderr. */
  write?: LogWriter;
};

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'bigint') return `${value}n`;
  return JSON.stringify(value) ?? String(value);
}

export class Logger {
  constructor(private readonly options: LoggerOptions = {}) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.options.level ?? 'info'];
  }

  private write(line: string): void {
    if (this.options.write) {
      this.options.write(line);
      return;
    }
    process.stderr.write(`${line}\n`);
  }

  child(fields: Record<string, unknown>): Logger {
    const parent = this;
    return new (class extends Logger {
      override log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
        parent.log(level, msg, { ...fields, ...(extra ?? {}) });
      }
    })(this.options);
  }

  log(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;

    const record: LogRecord = {
      ts: new Date().toISOString(),
      level,
      msg,
      ...(extra ?? {}),
    };

    if ((this.options.format ?? 'text') === 'json') {
      this.write(JSON.stringify(record, (_key, value: unknown) =>
        typeof value === 'bigint' ? value.toString() : value
      ));
      return;
    }

    const fieldPart = Object.entries(extra ?? {})
      .map(([key, value]) => ` ${key}=${formatValue(value)}`)
      .join('');
    this.write(`[${record.ts}] ${level.toUpperCase()} ${msg}${fieldPart}`);
  }

  debug(msg: string, extra?: Record<string, unknown>) {
    this.log('debug', msg, extra);
  }
  info(msg: string, extra?: Record<string, unknown>) {
    this.log('info', msg, extra);
  }
  warn(msg: string, extra?: Record<string, unknown>) {
    this.log('warn', msg, extra);
  }
  error(msg: string, extra?: Record<string, unknown>) {
    this.log('error', msg, extra);
  }
}
