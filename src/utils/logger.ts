import { ConfigService } from '../config/config-service.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogMetadata {
  [key: string]: unknown;
}

/** AMC_DEBUG_BIND=1 时单独打开调试日志的组件 */
const BINDER_COMPONENT = 'binder';

export class Logger {
  /**
   * @param minLevel - 固定的最低级别；省略时每次输出前从 ConfigService 读取
   */
  constructor(private readonly component: string, private readonly minLevel?: LogLevel) {}

  debug(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.DEBUG, message, meta);
  }

  info(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.INFO, message, meta);
  }

  warn(message: string, meta?: LogMetadata): void {
    this.log(LogLevel.WARN, message, meta);
  }

  error(message: string, error?: Error, meta?: LogMetadata): void {
    const errorMeta = error
      ? {
          error: error.message,
          stack: error.stack,
          ...meta,
        }
      : meta;
    this.log(LogLevel.ERROR, message, errorMeta);
  }

  isEnabled(level: LogLevel): boolean {
    return level >= this.threshold();
  }

  private threshold(): LogLevel {
    if (this.minLevel !== undefined) return this.minLevel;
    const config = ConfigService.getInstance();
    if (this.component === BINDER_COMPONENT && config.debugBind) return LogLevel.DEBUG;
    return config.logLevel;
  }

  private log(level: LogLevel, message: string, meta?: LogMetadata): void {
    if (!this.isEnabled(level)) return;

    const entry = {
      level: LogLevel[level],
      timestamp: new Date().toISOString(),
      component: this.component,
      message,
      ...meta,
    };

    // stdout 保留给生成物与 CLI 输出
    console.error(JSON.stringify(entry));
  }
}

export interface PerformanceMetrics {
  component: string;
  operation: string;
  duration: number;
  metadata?: LogMetadata;
}

const performanceLogger = new Logger('performance');

export function logPerformance(metrics: PerformanceMetrics): void {
  performanceLogger.info(`${metrics.operation} completed`, {
    component: metrics.component,
    duration_ms: Number(metrics.duration.toFixed(3)),
    ...metrics.metadata,
  });
}

export function createLogger(component: string): Logger {
  return new Logger(component);
}
