import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import {
  createLogger,
  Logger,
  LogLevel,
  logParseSummary,
  logParseTiming,
} from '../../../src/utils/logger.js';
import { ConfigService } from '../../../src/config/config-service.js';
import { captureStderr } from '../../helpers/test-utils.js';

const ORIGINAL_LOG_LEVEL = process.env.LOG_LEVEL;

function restoreEnv(): void {
  if (typeof ORIGINAL_LOG_LEVEL === 'undefined') {
    delete process.env.LOG_LEVEL;
  } else {
    process.env.LOG_LEVEL = ORIGINAL_LOG_LEVEL;
  }
}

/** 解析 JSON 行并去掉时间戳 */
function parseEntries(lines: string[]): Array<Record<string, unknown>> {
  return lines.map((line) => {
    const entry: unknown = JSON.parse(line);
    assert.ok(typeof entry === 'object' && entry !== null && !Array.isArray(entry));
    const { timestamp, ...rest } = Object.fromEntries(Object.entries(entry));
    assert.equal(typeof timestamp, 'string');
    return rest;
  });
}

beforeEach(() => {
  restoreEnv();
  ConfigService.resetForTesting();
});

afterEach(() => {
  restoreEnv();
  ConfigService.resetForTesting();
});

describe('Logger', () => {
  it('应该按最低级别过滤日志', () => {
    const logger = new Logger('parser', LogLevel.INFO);
    const lines = captureStderr(() => {
      logger.debug('hidden');
      logger.info('shown', { statements: 2 });
    });

    assert.deepEqual(parseEntries(lines), [
      { level: 'INFO', component: 'parser', message: 'shown', statements: 2 },
    ]);
  });

  it('isEnabled 应该比较日志级别', () => {
    const logger = new Logger('x', LogLevel.INFO);
    assert.equal(logger.isEnabled(LogLevel.DEBUG), false);
    assert.equal(logger.isEnabled(LogLevel.INFO), true);
    assert.equal(logger.isEnabled(LogLevel.ERROR), true);
  });
});

describe('createLogger', () => {
  it('应该从配置读取最低级别', () => {
    process.env.LOG_LEVEL = 'ERROR';
    ConfigService.resetForTesting();

    const logger = createLogger('parser');
    assert.equal(logger.component, 'parser');
    assert.equal(logger.isEnabled(LogLevel.WARN), false);
    assert.equal(logger.isEnabled(LogLevel.ERROR), true);
  });
});

describe('logParseSummary', () => {
  it('成功摘要应该记录语句数与耗时', () => {
    const logger = new Logger('parser', LogLevel.DEBUG);
    const lines = captureStderr(() => {
      logParseSummary(logger, {
        outcome: 'completed',
        file: 'a.brook',
        statements: 3,
        durationMs: 0.25,
      });
    });

    assert.deepEqual(parseEntries(lines), [
      {
        level: 'DEBUG',
        component: 'parser',
        message: 'parse completed',
        file: 'a.brook',
        statements: 3,
        duration_ms: 0.25,
      },
    ]);
  });

  it('失败摘要只在给出轨迹时附带 trail', () => {
    const logger = new Logger('parser', LogLevel.DEBUG);
    const lines = captureStderr(() => {
      logParseSummary(logger, { outcome: 'failed', file: 'a.brook', code: 'P006', durationMs: 1 });
      logParseSummary(logger, {
        outcome: 'failed',
        file: 'a.brook',
        code: 'P006',
        durationMs: 1,
        trail: "program: continue_statement: expected ';' at offset 8",
      });
    });

    const [plain, traced] = parseEntries(lines);
    assert.equal(plain?.message, 'parse failed');
    assert.equal('trail' in (plain ?? {}), false);
    assert.equal(traced?.trail, "program: continue_statement: expected ';' at offset 8");
    assert.equal(traced?.code, 'P006');
  });

  it('日志级别高于 DEBUG 时不应该输出', () => {
    const logger = new Logger('parser', LogLevel.INFO);
    const lines = captureStderr(() => {
      logParseSummary(logger, { outcome: 'completed', file: 'a.brook', statements: 0, durationMs: 0 });
    });
    assert.deepEqual(lines, []);
  });
});

describe('logParseTiming', () => {
  it('应该以 performance 组件输出耗时', () => {
    const lines = captureStderr(() => {
      logParseTiming({ file: 'a.brook', durationMs: 1.5 });
    });

    assert.deepEqual(parseEntries(lines), [
      {
        level: 'INFO',
        component: 'performance',
        message: 'parse completed',
        source: 'parser',
        file: 'a.brook',
        duration_ms: 1.5,
      },
    ]);
  });

  it('LOG_LEVEL=ERROR 时应该静默', () => {
    process.env.LOG_LEVEL = 'ERROR';
    ConfigService.resetForTesting();

    const lines = captureStderr(() => {
      logParseTiming({ file: 'a.brook', durationMs: 1.5 });
    });
    assert.deepEqual(lines, []);
  });
});
