import { ConfigService } from '../config/config-service.js';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

/** 日志附加字段；值保持为 JSON 标量，便于逐行 grep */
export type LogFields = Readonly<Record<string, string | number | boolean>>;

/**
 * 组件日志：每条记录一行 JSON，写到 stderr
 *
 * 只有 driver 层写日志，组合子本身从不记录。
 */
export class Logger {
  constructor(
    readonly component: string,
    private readonly minLevel: LogLevel = LogLevel.INFO
  ) {}

  isEnabled(level: LogLevel): boolean {
    return level >= this.minLevel;
  }

  debug(message: string, fields?: LogFields): void {
    this.write(LogLevel.DEBUG, message, fields);
  }

  info(message: string, fields?: LogFields): void {
    this.write(LogLevel.INFO, message, fields);
  }

  private write(level: LogLevel, message: string, fields?: LogFields): void {
    if (!this.isEnabled(level)) return;
    // stdout 留给宿主工具
    console.error(
      JSON.stringify({
        level: LogLevel[level],
        timestamp: new Date().toISOString(),
        component: this.component,
        message,
        ...fields,
      })
    );
  }
}

/**
 * 一次 parse() 的结果摘要
 *
 * trail 是渲染后的失败轨迹，只在开启解析调试时附带。
 */
export type ParseSummary =
  | {
      readonly outcome: 'completed';
      readonly file: string;
      readonly statements: number;
      readonly durationMs: number;
    }
  | {
      readonly outcome: 'failed';
      readonly file: string;
      readonly code: string;
      readonly durationMs: number;
      readonly trail?: string;
    };

export function logParseSummary(logger: Logger, summary: ParseSummary): void {
  if (summary.outcome === 'completed') {
    logger.debug('parse completed', {
      file: summary.file,
      statements: summary.statements,
      duration_ms: summary.durationMs,
    });
    return;
  }
  logger.debug('parse failed', {
    file: summary.file,
    code: summary.code,
    duration_ms: summary.durationMs,
    ...(summary.trail === undefined ? {} : { trail: summary.trail }),
  });
}

export interface ParseTiming {
  file: string;
  durationMs: number;
}

/** BROOK_DEBUG_PARSER=1 时的耗时记录，组件名固定为 performance */
export function logParseTiming(timing: ParseTiming): void {
  createLogger('performance').info('parse completed', {
    source: 'parser',
    file: timing.file,
    duration_ms: timing.durationMs,
  });
}

export function createLogger(component: string): Logger {
  return new Logger(component, ConfigService.getInstance().logLevel);
}
