export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVELS, value);
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  context?: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

export type Transport = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  context?: string;
}

export class Logger {
  private transports: Transport[] = [];
  private level: LogLevel;
  readonly context?: string;

  constructor(opts?: LoggerOptions) {
    this.level = opts?.level ?? 'info';
    this.context = opts?.context;
  }

  addTransport(transport: Transport): this {
    this.transports.push(transport);
    return this;
  }

  /** Children share the parent's transports, including ones added later. */
  child(context: string): Logger {
    const child = new Logger({
      level: this.level,
      context: this.context ? `${this.context}.${context}` : context,
    });
    child.transports = this.transports;
    return child;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return;
    const entry: LogEntry = {
      level,
      message,
      context: this.context,
      timestamp: new Date().toISOString(),
      data,
    };
    for (const t of this.transports) {
      t(entry);
    }
  }
}

export function stderrTransport(entry: LogEntry): void {
  const prefix = entry.context ? ` [${entry.context}]` : '';
  const data = entry.data ? ` ${JSON.stringify(entry.data)}` : '';
  process.stderr.write(`${entry.timestamp} ${entry.level.toUpperCase()}${prefix} ${entry.message}${data}\n`);
}

/** Collects entries in memory; used by tests and by hosts that render a log panel. */
export function memoryTransport(): { transport: Transport; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  return { transport: (entry) => { entries.push(entry); }, entries };
}
