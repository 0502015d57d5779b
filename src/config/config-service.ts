/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理编译器读取的所有环境变量。
 *
 * **设计目标**：
 * - 单一数据源：所有配置从 ConfigService 获取，避免散落的 process.env 访问
 * - 类型安全：提供强类型配置接口，在启动时校验配置有效性
 * - 可测试性：支持测试环境下重置配置
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * const config = ConfigService.getInstance();
 * const limit = pLimit(config.workers);
 * ```
 */

import { LogLevel } from '../utils/logger.js';

const DEFAULT_WORKERS = 4;

/**
 * 配置服务单例类。
 *
 * 在首次调用 getInstance() 时初始化，从环境变量读取所有配置。
 * 配置项在实例生命周期内保持不变（只读）。
 */
export class ConfigService {
  private static instance: ConfigService | null = null;

  /** 日志级别（默认 INFO） */
  readonly logLevel: LogLevel;

  /** 并行 worker 数量（默认 4，AMC_WORKERS 覆盖） */
  readonly workers: number;

  /** 未显式传入时使用的默认特性集合（AMC_FEATURES=a,b） */
  readonly defaultFeatures: readonly string[];

  /** 是否输出绑定器调试日志（AMC_DEBUG_BIND=1） */
  readonly debugBind: boolean;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.workers = this.parseWorkers(process.env.AMC_WORKERS);
    this.defaultFeatures = (process.env.AMC_FEATURES ?? '')
      .split(',')
      .map(item => item.trim())
      .filter(item => item.length > 0);
    this.debugBind = process.env.AMC_DEBUG_BIND === '1';
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值。
   *
   * @param raw - 原始环境变量值
   * @returns 解析后的 LogLevel，默认 INFO
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    switch ((raw ?? '').toUpperCase()) {
      case 'DEBUG':
        return LogLevel.DEBUG;
      case 'WARN':
        return LogLevel.WARN;
      case 'ERROR':
        return LogLevel.ERROR;
      default:
        return LogLevel.INFO;
    }
  }

  private parseWorkers(raw: string | undefined): number {
    if (!raw) return DEFAULT_WORKERS;
    const parsed = Number.parseInt(raw, 10);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new Error(`AMC_WORKERS must be a positive integer, got '${raw}'`);
    }
    return parsed;
  }

  /**
   * 获取 ConfigService 单例实例。
   */
  static getInstance(): ConfigService {
    if (ConfigService.instance === null) {
      ConfigService.instance = new ConfigService();
    }
    return ConfigService.instance;
  }

  /**
   * 重置单例实例（仅用于测试）。
   *
   * 重置后，下次调用 getInstance() 会重新读取环境变量。
   */
  static resetForTesting(): void {
    ConfigService.instance = null;
  }
}
