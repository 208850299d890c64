import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerOptions {
  debug?: boolean;
  file?: string | null;
  console?: boolean;
}

export class Logger {
  private debugEnabled: boolean;
  private readonly file: string | null;
  private readonly toConsole: boolean;

  constructor(options: LoggerOptions = {}) {
    this.debugEnabled = options.debug ?? false;
    this.file = options.file ?? null;
    this.toConsole = options.console ?? true;

    if (this.file) {
      mkdirSync(dirname(this.file), { recursive: true });
    }
  }

  enableDebug(): void {
    this.debugEnabled = true;
  }

  debug(message: string): void {
    if (!this.debugEnabled) {
      return;
    }

    this.write('debug', message);

    if (this.toConsole) {
      console.log(chalk.gray(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    this.write('info', message);

    if (this.toConsole) {
      console.log(chalk.blue(`[INFO] ${message}`));
    }
  }

  warn(message: string): void {
    this.write('warn', message);

    if (this.toConsole) {
      console.warn(chalk.yellow(`[WARN] ${message}`));
    }
  }

  error(message: string, error?: unknown): void {
    const detail = error instanceof Error && error.stack ? `\n${error.stack}` : '';
    this.write('error', message + detail);

    if (this.toConsole) {
      console.error(chalk.red(`[ERROR] ${message}`));
    }
  }

  success(message: string): void {
    this.write('info', message);

    if (this.toConsole) {
      console.log(chalk.green(`[OK] ${message}`));
    }
  }

  private write(level: LogLevel, message: string): void {
    if (!this.file) {
      return;
    }

    appendFileSync(this.file, `${new Date().toISOString()} - ${level.toUpperCase()} - ${message}\n`);
  }
}

export function createSilentLogger(): Logger {
  return new Logger({ console: false });
}
