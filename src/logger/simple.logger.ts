import { LoggerService, LogLevel } from '@nestjs/common';

/**
 * Timestamped, uncolored console output used in production
 */
export class SimpleLogger implements LoggerService {
  private logLevels: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

  private getTimestamp(): string {
    return new Date().toISOString();
  }

  private format(message: unknown, context?: string): string {
    const text =
      typeof message === 'string' ? message : JSON.stringify(message);
    return context
      ? `[${this.getTimestamp()}] [${context}] ${text}`
      : `[${this.getTimestamp()}] ${text}`;
  }

  setLogLevels(levels: LogLevel[]) {
    this.logLevels = levels;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return this.logLevels.includes(level);
  }

  log(message: unknown, context?: string) {
    if (this.isLevelEnabled('log')) {
      console.log(this.format(message, context));
    }
  }

  error(message: unknown, trace?: string, context?: string) {
    if (this.isLevelEnabled('error')) {
      console.error(this.format(message, context));
      if (trace) console.error(this.format(trace, context));
    }
  }

  warn(message: unknown, context?: string) {
    if (this.isLevelEnabled('warn')) {
      console.warn(this.format(message, context));
    }
  }

  debug(message: unknown, context?: string) {
    if (this.isLevelEnabled('debug')) {
      console.debug(this.format(message, context));
    }
  }

  verbose(message: unknown, context?: string) {
    if (this.isLevelEnabled('verbose')) {
      console.log(this.format(message, context));
    }
  }
}
