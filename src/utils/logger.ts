import chalk from 'chalk';
import type { ChalkInstance } from 'chalk';

type Level = 'debug' | 'info' | 'warn' | 'error' | 'success';

type Sink = (...data: unknown[]) => void;

/** Label, colour and console stream per level; stdout is left to info, success and the summary */
const LEVELS: Record<Level, { label: string; color: ChalkInstance; sink: () => Sink }> = {
  debug: { label: 'DEBUG', color: chalk.gray, sink: () => console.error },
  info: { label: 'INFO', color: chalk.blue, sink: () => console.log },
  warn: { label: 'WARN', color: chalk.yellow, sink: () => console.warn },
  error: { label: 'ERROR', color: chalk.red, sink: () => console.error },
  success: { label: 'DONE', color: chalk.green, sink: () => console.log }
};

class Logger {
  private debugEnabled = false;

  enableDebug(): void {
    this.debugEnabled = true;
  }

  disableDebug(): void {
    this.debugEnabled = false;
  }

  /** Whether `--debug` was given; also gates stack traces on fatal errors */
  isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.debugEnabled) {
      this.write('debug', message, args);
    }
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

  success(message: string, ...args: unknown[]): void {
    this.write('success', message, args);
  }

  private write(level: Level, message: string, args: unknown[]): void {
    const { label, color, sink } = LEVELS[level];
    sink()(color(`[${label}] ${message}`), ...args);
  }
}

export const logger = new Logger();
