import { TraceContext } from '../../types/CommonTypes';

export interface LogMeta {
  [key: string]: unknown;
  traceId?: string;
  userId?: string;
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export class Logger {
  private readonly serviceName: string;
  private readonly defaultContext?: TraceContext;

  constructor(serviceName: string, context?: TraceContext) {
    this.serviceName = serviceName;
    this.defaultContext = context;
  }

  private formatMessage(
    level: LogLevel,
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
    if (logLevel.toLowerCase() === 'debug') {
      console.log(this.formatMessage('debug', message, meta));
    }
  }

  /**
   * Logger for a collaborator, same context, different component name
   */
  child(serviceName: string): Logger {
    return new Logger(serviceName, this.defaultContext);
  }

  /**
   * Same component, context merged over the current one. The receiver is not
   * changed, so concurrent operations each keep their own trace.
   */
  withContext(context: TraceContext): Logger {
    return new Logger(this.serviceName, { ...this.defaultContext, ...context });
  }
}
