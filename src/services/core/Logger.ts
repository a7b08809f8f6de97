export interface LogContext {
  featureGroupName?: string;
  executionId?: string;
  namespace?: string;
}

export interface LogMeta extends LogContext {
  [key: string]: unknown;
}

export class Logger {
  private readonly serviceName: string;
  private readonly defaultContext?: LogContext;

  constructor(serviceName: string, context?: LogContext) {
    this.serviceName = serviceName;
    this.defaultContext = context;
  }

  private formatMessage(
    level: string,
    message: string,
    meta?: LogMeta
  ): string {
    const timestamp = new Date().toISOString();
    const enrichedMeta = {
      ...this.defaultContext,
      ...meta,
    };
    const metaStr = Object.keys(enrichedMeta).length > 0 ? ` ${JSON.stringify(enrichedMeta)}` : '';
    return `[${timestamp}] [${level.toUpperCase()}] [${this.serviceName}] ${message}${metaStr}`;
  }

  info(message: string, meta?: LogMeta): void {
    console.log(this.formatMessage('info', message, meta));
  }

  error(message: string, meta?: LogMeta): void {
    console.error(this.formatMessage('error', message, meta));
  }

  warn(message: string, meta?: LogMeta): void {
    console.warn(this.formatMessage('warn', message, meta));
  }

  debug(message: string, meta?: LogMeta): void {
    const logLevel = process.env.LOG_LEVEL || 'info';
    if (logLevel === 'debug') {
      console.log(this.formatMessage('debug', message, meta));
    }
  }

  /** Child logger sharing this service name with extra bound context. */
  child(context: LogContext): Logger {
    return new Logger(this.serviceName, { ...this.defaultContext, ...context });
  }
}
