export type LogLevel = 'none' | 'basic' | 'detailed';

export type LogFunction = (message: string, ...args: unknown[]) => void;

/**
 * Configuration options for request logging
 */
export interface LoggingOptions {
  /** Enable request/response logging */
  enableRequestLogging?: boolean;
  /** Custom logger function (defaults to console.log) */
  logger?: LogFunction;
  /** Log level: 'none', 'basic', 'detailed' */
  logLevel?: LogLevel;
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  return value === 'none' || value === 'basic' || value === 'detailed' ? value : undefined;
}

/**
 * Default logging configuration from environment variables
 */
export const getDefaultLoggingOptions = (): LoggingOptions => ({
  enableRequestLogging: process.env.OPERATIONS_TRACE_REQUESTS === 'true' || process.env.NODE_ENV === 'development',
  logger: console.log,
  logLevel: parseLogLevel(process.env.OPERATIONS_TRACE_LEVEL) || 'basic'
});

export class OperationLogger {
  private readonly config: LoggingOptions;

  constructor(options?: LoggingOptions) {
    this.config = { ...getDefaultLoggingOptions(), ...options };
  }

  private get enabled(): boolean {
    return this.config.enableRequestLogging === true && this.config.logLevel !== 'none';
  }

  /** One line per call, page or poll */
  basic(message: string): void {
    if (this.enabled) {
      this.write(message);
    }
  }

  /** Payload dumps, only at the 'detailed' level */
  detailed(message: string, payload: unknown): void {
    if (this.enabled && this.config.logLevel === 'detailed') {
      this.write(message, JSON.stringify(payload, null, 2));
    }
  }

  private write(message: string, ...args: unknown[]): void {
    const logger = this.config.logger || console.log;
    logger(message, ...args);
  }
}
