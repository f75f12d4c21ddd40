export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;

  // Time tracking methods
  time(label: string): void;
  timeEnd(label: string): number; // Returns duration in ms
  timeLog(label: string, message?: string, ...args: unknown[]): void;
}
