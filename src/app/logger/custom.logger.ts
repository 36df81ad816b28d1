import { ConsoleLogger, Injectable, LogLevel, Scope } from '@nestjs/common';

const CALLER_PATTERNS = [/\((.*):(\d+):(\d+)\)/, /at\s+(.*):(\d+):(\d+)/];

/**
 * Console logger without pid/timestamp that tags each line with the
 * `file:line` under src/ that emitted it.
 */
@Injectable({ scope: Scope.TRANSIENT })
export class CustomLogger extends ConsoleLogger {
  constructor() {
    super();
    this.setContext('');
  }

  protected formatPid(_pid: number): string {
    return '';
  }

  protected getTimestamp(): string {
    return '';
  }

  protected formatMessage(
    logLevel: LogLevel,
    message: unknown,
    pidMessage: string,
    formattedLogLevel: string,
    contextMessage: string,
    timestampDiff: string,
  ): string {
    return super
      .formatMessage(
        logLevel,
        message,
        pidMessage,
        formattedLogLevel,
        contextMessage,
        timestampDiff,
      )
      .replace(/^\s+/, '');
  }

  log(message: unknown, context?: string) {
    super.log(message, this.withCaller(context));
  }

  error(message: unknown, stack?: string, context?: string) {
    super.error(message, stack, this.withCaller(context));
  }

  warn(message: unknown, context?: string) {
    super.warn(message, this.withCaller(context));
  }

  debug(message: unknown, context?: string) {
    super.debug(message, this.withCaller(context));
  }

  verbose(message: unknown, context?: string) {
    super.verbose(message, this.withCaller(context));
  }

  private withCaller(context?: string): string {
    const caller = this.getCaller();
    if (!context) return caller ?? '';
    return caller ? `${context}] [${caller}` : context;
  }

  private getCaller(): string | null {
    const stack = new Error().stack;
    if (!stack) return null;

    for (const line of stack.split('\n')) {
      if (
        line.includes('CustomLogger') ||
        line.includes('node_modules') ||
        line.includes('Error')
      ) {
        continue;
      }

      for (const pattern of CALLER_PATTERNS) {
        const match = line.match(pattern);
        if (match && match[1].includes('/src/')) {
          return `${match[1].split('/src/').pop()}:${match[2]}`;
        }
      }
    }

    return null;
  }
}
