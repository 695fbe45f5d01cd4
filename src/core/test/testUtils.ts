import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { AppConfig } from '../config/ConfigInterface';
import { ConfigValidator } from '../config/ConfigValidator';
import { ILogger } from '../logging/LoggerInterface';

/**
 * 测试用日志器，所有方法均为jest.fn
 */
export function createMockLogger(): jest.Mocked<ILogger> {
  const logger: jest.Mocked<ILogger> = {
    error: jest.fn(),
    warn: jest.fn(),
    info: jest.fn(),
    debug: jest.fn(),
    verbose: jest.fn(),
    child: jest.fn(),
    flush: jest.fn().mockResolvedValue(undefined),
    close: jest.fn().mockResolvedValue(undefined)
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

/**
 * 在系统临时目录下创建独立的测试根目录
 */
export async function createTempRoot(prefix = 'screenshot-test-'): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * 基于默认配置的测试配置，目录都放在 root 下
 */
export function createTestConfig(root: string, screenshots: Partial<AppConfig['screenshots']> = {}): AppConfig {
  const defaults = ConfigValidator.getDefaultConfig();
  return {
    ...defaults,
    app: { ...defaults.app, environment: 'test' },
    server: { ...defaults.server, port: 0, host: '127.0.0.1' },
    storage: {
      tempPath: path.join(root, 'jobs'),
      uploadPath: path.join(root, 'uploads'),
      logPath: path.join(root, 'logs')
    },
    screenshots: { ...defaults.screenshots, ...screenshots }
  };
}
