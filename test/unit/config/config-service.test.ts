import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { ConfigService } from '../../../src/config/config-service.js';
import { LogLevel } from '../../../src/utils/logger.js';

const ENV_KEYS = ['LOG_LEVEL', 'AMC_WORKERS', 'AMC_FEATURES', 'AMC_DEBUG_BIND'];

const ORIGINAL_ENV: Record<string, string | undefined> = Object.fromEntries(
  ENV_KEYS.map((key) => [key, process.env[key]])
);

function restoreEnv(): void {
  for (const key of ENV_KEYS) {
    const value = ORIGINAL_ENV[key];
    if (typeof value === 'undefined') {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
}

function clearEnv(): void {
  for (const key of ENV_KEYS) delete process.env[key];
}

beforeEach(() => {
  clearEnv();
  ConfigService.resetForTesting();
});

afterEach(() => {
  restoreEnv();
  ConfigService.resetForTesting();
});

describe('ConfigService', () => {
  it('应该在未配置时使用默认值', () => {
    const instance = ConfigService.getInstance();

    assert.strictEqual(instance.logLevel, LogLevel.INFO);
    assert.strictEqual(instance.workers, 4);
    assert.deepStrictEqual(instance.defaultFeatures, []);
    assert.strictEqual(instance.debugBind, false);
  });

  it('应该在非法日志级别时回退到 INFO', () => {
    process.env.LOG_LEVEL = 'verbose';

    assert.strictEqual(ConfigService.getInstance().logLevel, LogLevel.INFO);
  });

  it('日志级别不区分大小写', () => {
    process.env.LOG_LEVEL = 'warn';

    assert.strictEqual(ConfigService.getInstance().logLevel, LogLevel.WARN);
  });

  it('应该从 AMC_WORKERS 读取并行度', () => {
    process.env.AMC_WORKERS = '8';

    assert.strictEqual(ConfigService.getInstance().workers, 8);
  });

  it('AMC_WORKERS 不是正整数时应该抛出错误', () => {
    process.env.AMC_WORKERS = '0';

    assert.throws(() => ConfigService.getInstance(), /AMC_WORKERS must be a positive integer, got '0'/);
  });

  it('应该把 AMC_FEATURES 拆分为特性列表并忽略空项', () => {
    process.env.AMC_FEATURES = 'net, gpu,,';

    assert.deepStrictEqual(ConfigService.getInstance().defaultFeatures, ['net', 'gpu']);
  });

  it('AMC_DEBUG_BIND=1 时开启绑定器调试', () => {
    process.env.AMC_DEBUG_BIND = '1';

    assert.strictEqual(ConfigService.getInstance().debugBind, true);
  });

  it('实例在重置前保持不变', () => {
    const first = ConfigService.getInstance();
    process.env.AMC_WORKERS = '2';

    assert.strictEqual(ConfigService.getInstance(), first);
    assert.strictEqual(ConfigService.getInstance().workers, 4);

    ConfigService.resetForTesting();
    assert.strictEqual(ConfigService.getInstance().workers, 2);
  });
});
