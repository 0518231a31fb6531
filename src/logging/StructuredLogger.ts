import fs from 'node:fs/promises';
import path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const isLogLevel = (value: string): value is LogLevel => LOG_LEVELS.some((level) => level === value);

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  message: string;
}

export interface StructuredLoggerOptions {
  /** Mirror entries to the console. Terminal mode turns this off to keep stdout readable. */
  console?: boolean;
  minLevel?: LogLevel;
  now?: () => Date;
}

const CONSOLE_WRITERS: Record<LogLevel, ((message: string, context: LogContext) => void) | undefined> = {
  debug: undefined,
  info: (message, context) => console.log(`[Murmur] ${message}`, context),
  warn: (message, context) => console.warn(`[Murmur] ${message}`, context),
  error: (message, context) => console.error(`[Murmur] ${message}`, context)
};

/** One file per UTC day; every logger derived from the same `create` call appends through one queue. */
class LogSink {
  private writeQueue: Promise<void> = Promise.resolve();

  public constructor(
    private readonly logDir: string,
    public readonly mirrorToConsole: boolean,
    public readonly minRank: number,
    public readonly now: () => Date
  ) {}

  public filePathFor(date: Date): string {
    return path.join(this.logDir, `murmur-${date.toISOString().slice(0, 10)}.log`);
  }

  public append(entry: LogEntry, date: Date): void {
    const filePath = this.filePathFor(date);
    const line = `${JSON.stringify(entry)}\n`;

    this.writeQueue = this.writeQueue
      .then(async () => {
        await fs.appendFile(filePath, line, 'utf8');
      })
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        console.error(`[Murmur] Failed to write log file: ${detail}`);
      });
  }

  public async flush(): Promise<void> {
    await this.writeQueue;
  }
}

export class StructuredLogger {
  private constructor(
    private readonly sink: LogSink,
    private readonly bindings: LogContext
  ) {}

  public static async create(logDir: string, options: StructuredLoggerOptions = {}): Promise<StructuredLogger> {
    await fs.mkdir(logDir, { recursive: true });

    const sink = new LogSink(
      logDir,
      options.console ?? true,
      LOG_LEVELS.indexOf(options.minLevel ?? 'debug'),
      options.now ?? (() => new Date())
    );
    return new StructuredLogger(sink, {});
  }

  /** Path of the file entries written now would go to. */
  public getLogPath(): string {
    return this.sink.filePathFor(this.sink.now());
  }

  /** A logger that adds `bindings` to every entry and shares this logger's file and queue. */
  public child(bindings: LogContext): StructuredLogger {
    return new StructuredLogger(this.sink, { ...this.bindings, ...bindings });
  }

  public isLevelEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.sink.minRank;
  }

  public debug(message: string, context: LogContext = {}): void {
    this.write('debug', message, context);
  }

  public info(message: string, context: LogContext = {}): void {
    this.write('info', message, context);
  }

  public warn(message: string, context: LogContext = {}): void {
    this.write('warn', message, context);
  }

  public error(message: string, context: LogContext = {}): void {
    this.write('error', message, context);
  }

  /** Resolves once every entry written so far has reached the file. */
  public async flush(): Promise<void> {
    await this.sink.flush();
  }

  private write(level: LogLevel, message: string, context: LogContext): void {
    if (!this.isLevelEnabled(level)) {
      return;
    }

    const date = this.sink.now();
    const fields = { ...this.bindings, ...context };
    this.sink.append({ ts: date.toISOString(), level, message, ...fields }, date);

    if (this.sink.mirrorToConsole) {
      CONSOLE_WRITERS[level]?.(message, fields);
    }
  }
}
