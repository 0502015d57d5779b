import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigService } from '../../../src/config/config-service.js';
import { createLogger, Logger, LogLevel } from '../../../src/utils/logger.js';

const ENV_KEYS = ['LOG_LEVEL', 'AMC_DEBUG_BIND'];
const ORIGINAL_ENV: Record<string, string | undefined> = Object.fromEntries(ENV_KEYS.map(key => [key, process.env[key]]));

beforeEach(() => {
  for (const key of ENV_KEYS) delete process.env[key];
  ConfigService.resetForTesting();
});

afterEach(() => {
  for (const key of ENV_KEYS) {
    const value = ORIGINAL_ENV[key];
    if (typeof value === 'undefined') delete process.env[key];
    else process.env[key] = value;
  }
  ConfigService.resetForTesting();
});

describe('Logger', () => {
  it('默认级别来自 LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'error';
    const logger = createLogger('driver');

    assert.equal(logger.isEnabled(LogLevel.WARN), false);
    assert.equal(logger.isEnabled(LogLevel.ERROR), true);
  });

  it('AMC_DEBUG_BIND=1 只为绑定器打开调试日志', () => {
    process.env.AMC_DEBUG_BIND = '1';

    assert.equal(createLogger('binder').isEnabled(LogLevel.DEBUG), true);
    assert.equal(createLogger('driver').isEnabled(LogLevel.DEBUG), false);
  });

  it('模块级 logger 在配置重置后读取新的级别', () => {
    const logger = createLogger('binder');
    assert.equal(logger.isEnabled(LogLevel.DEBUG), false);

    process.env.LOG_LEVEL = 'debug';
    ConfigService.resetForTesting();
    assert.equal(logger.isEnabled(LogLevel.DEBUG), true);
  });

  it('显式级别不受配置影响', () => {
    process.env.AMC_DEBUG_BIND = '1';

    assert.equal(new Logger('binder', LogLevel.WARN).isEnabled(LogLevel.DEBUG), false);
  });
});
