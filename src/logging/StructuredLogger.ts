import fs from 'node:fs/promises';
import path from 'node:path';
import type { LogLevelName } from '../types';

export type LogLevel = LogLevelName;

export interface LogContext {
  [key: string]: unknown;
}

interface LogEntry extends LogContext {
  ts: string;
  level: LogLevel;
  component?: string;
  message: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export class StructuredLogger {
  private writeQueue: Promise<void> = Promise.resolve();

  private constructor(
    private readonly filePath: string,
    private readonly minLevel: LogLevel,
    private readonly component?: string,
    private readonly root?: StructuredLogger
  ) {}

  public static async create(logDir: string, minLevel: LogLevel = 'info'): Promise<StructuredLogger> {
    await fs.mkdir(logDir, { recursive: true });

    const datePrefix = new Date().toISOString().slice(0, 10);
    const filePath = path.join(logDir, `keymend-${datePrefix}.log`);

    return new StructuredLogger(filePath, minLevel);
  }

  public getLogPath(): string {
    return this.filePath;
  }

  /** Child logger sharing the file and queue, tagging every entry with `component`. */
  public child(component: string): StructuredLogger {
    return new StructuredLogger(this.filePath, this.minLevel, component, this.root ?? this);
  }

  public async flush(): Promise<void> {
    await (this.root ?? this).writeQueue;
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

  private write(level: LogLevel, message: string, context: LogContext): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      component: this.component,
      message,
      ...context
    };

    const line = `${JSON.stringify(entry)}\n`;
    const owner = this.root ?? this;

    owner.writeQueue = owner.writeQueue
      .then(async () => {
        await fs.appendFile(this.filePath, line, 'utf8');
      })
      .catch((error) => {
        const detail = error instanceof Error ? error.message : String(error);
        console.error(`[keymend] Failed to write log file: ${detail}`);
      });

    const prefix = this.component ? `[keymend:${this.component}]` : '[keymend]';

    if (level === 'error') {
      console.error(`${prefix} ${message}`, context);
      return;
    }

    if (level === 'warn') {
      console.warn(`${prefix} ${message}`, context);
      return;
    }

    console.log(`${prefix} ${message}`, context);
  }
}
