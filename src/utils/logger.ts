type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const isLogLevel = (value: string | undefined): value is LogLevel =>
  LEVELS.some((level) => level === value);

/**
 * The text shown to users and written to logs for a caught error
 */
export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

class Logger {
  private static instance: Logger;
  private appName = 'mediapick';
  private logLevel: LogLevel = 'info';

  private constructor() {
    const envLogLevel = process.env.LOG_LEVEL?.toLowerCase();
    if (isLogLevel(envLogLevel)) {
      this.logLevel = envLogLevel;
    }
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.logLevel);
  }

  private formatMessage(level: Uppercase<LogLevel>, message: string, context?: Record<string, unknown>): string {
    let formattedMessage = `${this.appName} | ${level}:`;

    if (context) {
      const essentialKeys = ['chat', 'from', 'msgId', 'mediaId', 'kind'];
      const essentialContext = Object.entries(context)
        .filter(([key]) => essentialKeys.includes(key))
        .map(([key, value]) => `${key}=${value}`)
        .join(' ');
      if (essentialContext) {
        formattedMessage += ` [${essentialContext}]`;
      }
    }

    formattedMessage += ` ${message}`;
    return formattedMessage;
  }

  private colorize(level: Uppercase<LogLevel>, message: string): string {
    const colors = {
      RESET: '\x1b[0m',
      ERROR: '\x1b[31m', // Red
      WARN: '\x1b[33m', // Yellow
      INFO: '\x1b[36m', // Cyan
      DEBUG: '\x1b[90m', // Gray
    } as const;

    return `${colors[level]}${message}${colors.RESET}`;
  }

  public info(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    const formattedMessage = this.formatMessage('INFO', message, context);
    process.stdout.write(this.colorize('INFO', formattedMessage) + '\n');
  }

  public error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    const errorDetails = error ? `: ${describeError(error)}` : '';

    const formattedMessage = this.formatMessage('ERROR', `${message}${errorDetails}`, context);
    console.error(this.colorize('ERROR', formattedMessage));
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    const formattedMessage = this.formatMessage('WARN', message, context);
    console.warn(this.colorize('WARN', formattedMessage));
  }

  public debug(message: string, context?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    const formattedMessage = this.formatMessage('DEBUG', message, context);
    process.stdout.write(this.colorize('DEBUG', formattedMessage) + '\n');
  }
}

export const logger = Logger.getInstance();
