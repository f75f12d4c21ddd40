import fs from 'fs';
import path from 'path';
import { LogLevel, Logger } from '../../core/services/Logger';

type RotationMode = 'none' | 'size';

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const CONSOLE_METHODS: Record<LogLevel, (message: string, ...args: unknown[]) => void> = {
  debug: (message, ...args) => console.debug(message, ...args),
  info: (message, ...args) => console.info(message, ...args),
  warn: (message, ...args) => console.warn(message, ...args),
  error: (message, ...args) => console.error(message, ...args),
};

export class ConsoleLogger implements Logger {
  private timers: Map<string, number> = new Map();
  private stream?: fs.WriteStream;
  private rotation: RotationMode;
  private maxSizeBytes: number = 10 * 1024 * 1024;
  private maxFiles: number = 5;
  private currentSize: number = 0;

  constructor(
    private logLevel: LogLevel = 'info',
    private filePath?: string,
    options?: { rotate?: RotationMode; maxSizeBytes?: number; maxFiles?: number }
  ) {
    this.rotation = options?.rotate ?? 'none';
    if (options?.maxSizeBytes) this.maxSizeBytes = options.maxSizeBytes;
    if (options?.maxFiles) this.maxFiles = options.maxFiles;
    if (filePath) this.openStream(filePath);
  }

  private openStream(filePath: string): void {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    // Opened synchronously so the file exists before the first rotation check.
    const fd = fs.openSync(filePath, 'a');
    this.stream = fs.createWriteStream(filePath, { fd, encoding: 'utf8' });
    this.currentSize = fs.fstatSync(fd).size;
  }

  // app.log -> app.log.1 -> app.log.2 ... keeping at most maxFiles rotated files
  private rotateIfNeeded(extraBytes: number): void {
    if (this.rotation !== 'size' || !this.filePath || !this.stream) return;
    if (this.currentSize + extraBytes <= this.maxSizeBytes) return;

    this.stream.end();
    this.stream = undefined;
    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const src = `${this.filePath}.${i}`;
      if (fs.existsSync(src)) fs.renameSync(src, `${this.filePath}.${i + 1}`);
    }
    if (fs.existsSync(this.filePath)) fs.renameSync(this.filePath, `${this.filePath}.1`);
    this.openStream(this.filePath);
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS[level] >= LEVELS[this.logLevel];
  }

  private formatMessage(level: LogLevel, message: string): string {
    return `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
  }

  private stringify(arg: unknown): string {
    if (arg instanceof Error) {
      return `${arg.name}: ${arg.message}${arg.stack ? `\n${arg.stack}` : ''}`;
    }
    if (typeof arg === 'string') return arg;
    try {
      return JSON.stringify(arg) ?? String(arg);
    } catch {
      return String(arg);
    }
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (!this.shouldLog(level)) return;
    const line = this.formatMessage(level, message);
    CONSOLE_METHODS[level](line, ...args);

    if (!this.stream) return;
    const extras = args.length ? ' ' + args.map((a) => this.stringify(a)).join(' ') : '';
    const entry = `${line}${extras}\n`;
    const bytes = Buffer.byteLength(entry, 'utf8');
    this.rotateIfNeeded(bytes);
    this.stream?.write(entry);
    this.currentSize += bytes;
  }

  debug(message: string, ...args: unknown[]): void {
    this.write('debug', message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write('info', message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write('warn', message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write('error', message, args);
  }

  time(label: string): void {
    this.timers.set(label, Date.now());
    this.debug(`Timer '${label}' started`);
  }

  timeEnd(label: string): number {
    const startTime = this.timers.get(label);
    if (startTime === undefined) {
      this.warn(`Timer '${label}' does not exist`);
      return 0;
    }

    const duration = Date.now() - startTime;
    this.timers.delete(label);
    this.debug(`Timer '${label}': ${duration}ms`);
    return duration;
  }

  timeLog(label: string, message?: string, ...args: unknown[]): void {
    const startTime = this.timers.get(label);
    if (startTime === undefined) {
      this.warn(`Timer '${label}' does not exist`);
      return;
    }

    const duration = Date.now() - startTime;
    this.info(message ? `${message} (${duration}ms)` : `Timer '${label}': ${duration}ms`, ...args);
  }

  // Flushes and closes the log file, if any.
  close(): Promise<void> {
    const stream = this.stream;
    this.stream = undefined;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => stream.end(() => resolve()));
  }
}
