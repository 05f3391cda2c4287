export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogData = Record<string, unknown>;

export interface LogEntry {
  level: LogLevel;
  module: string;
  message: string;
  data: LogData;
  timestamp: string;
}

/** Where formatted lines go; the console by default. */
export type LogSink = (level: LogLevel, line: string) => void;

const SEVERITY: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
} as const;

function isLogLevel(value: string): value is LogLevel {
  return value in SEVERITY;
}

export function minLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const requested = env.LOG_LEVEL?.toLowerCase();
  if (requested && isLogLevel(requested)) return requested;
  return env.NODE_ENV === 'production' ? 'info' : 'debug';
}

function plain(value: unknown): unknown {
  if (!(value instanceof Error)) return value;
  return process.env.NODE_ENV === 'production'
    ? { name: value.name, message: value.message }
    : { name: value.name, message: value.message, stack: value.stack };
}

export function formatPretty(entry: LogEntry): string {
  const clock = entry.timestamp.slice(11, 23);
  const head = `${ANSI.dim}${clock}${ANSI.reset} ${ANSI[entry.level]}${entry.level.toUpperCase().padEnd(5)}${ANSI.reset} `
    + `${ANSI.bold}[${entry.module}]${ANSI.reset} ${entry.message}`;

  const fields = Object.entries(entry.data).map(([key, raw]) => {
    const value = plain(raw);
    return `${ANSI.dim}${key}=${ANSI.reset}${typeof value === 'string' ? value : JSON.stringify(value)}`;
  });
  return fields.length > 0 ? `${head} ${fields.join(' ')}` : head;
}

export function formatJson(entry: LogEntry): string {
  const fields = Object.fromEntries(Object.entries(entry.data).map(([key, value]) => [key, plain(value)]));
  return JSON.stringify({ time: entry.timestamp, level: entry.level, module: entry.module, msg: entry.message, ...fields });
}

const consoleSink: LogSink = (level, line) => {
  if (level === 'error') console.error(line);
  else if (level === 'warn') console.warn(line);
  else if (level === 'debug') console.debug(line);
  else console.log(line);
};

export class Logger {
  constructor(
    private readonly module: string,
    private readonly bound: LogData = {},
    private readonly sink: LogSink = consoleSink,
  ) {}

  private write(level: LogLevel, message: string, data?: LogData): void {
    if (SEVERITY[level] < SEVERITY[minLevel()]) return;

    const entry: LogEntry = {
      level,
      module: this.module,
      message,
      data: { ...this.bound, ...data },
      timestamp: new Date().toISOString(),
    };
    this.sink(level, process.env.LOG_FORMAT === 'json' ? formatJson(entry) : formatPretty(entry));
  }

  debug(message: string, data?: LogData): void {
    this.write('debug', message, data);
  }

  info(message: string, data?: LogData): void {
    this.write('info', message, data);
  }

  warn(message: string, data?: LogData): void {
    this.write('warn', message, data);
  }

  error(message: string, data?: LogData): void {
    this.write('error', message, data);
  }

  /** Same module, extra fields on every line. */
  withData(data: LogData): Logger {
    return new Logger(this.module, { ...this.bound, ...data }, this.sink);
  }

  time(label: string): () => number {
    const start = performance.now();
    this.debug(`${label} started`);
    return () => {
      const durationMs = Math.round(performance.now() - start);
      this.debug(`${label} completed`, { durationMs });
      return durationMs;
    };
  }
}

export function createLogger(module: string, data?: LogData, sink?: LogSink): Logger {
  return new Logger(module, data, sink);
}
