/**
 * @module config-service
 *
 * 统一配置管理服务：集中管理所有环境变量配置。
 *
 * **设计目标**：
 * - 单一数据源：所有配置从 ConfigService 获取，避免散落的 process.env 访问
 * - 类型安全：提供强类型配置接口
 * - 可测试性：支持测试环境下重置配置
 * - 延迟初始化：使用单例模式，首次访问时初始化
 *
 * **使用方式**：
 * ```typescript
 * import { ConfigService } from './config/config-service.js';
 *
 * if (ConfigService.getInstance().debugParser) {
 *   // 输出失败轨迹
 * }
 * ```
 */

import { LogLevel } from '../utils/logger.js';

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

  /** 是否输出解析调试信息（默认 false，设置 BROOK_DEBUG_PARSER=1 启用） */
  readonly debugParser: boolean;

  private constructor() {
    this.logLevel = this.parseLogLevel(process.env.LOG_LEVEL);
    this.debugParser = process.env.BROOK_DEBUG_PARSER === '1';
  }

  /**
   * 解析 LOG_LEVEL 环境变量为 LogLevel 枚举值，无法识别时回退到 INFO。
   */
  private parseLogLevel(raw: string | undefined): LogLevel {
    switch (raw?.toUpperCase()) {
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
