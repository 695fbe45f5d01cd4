import * as fs from 'fs';
import * as path from 'path';
import { AppConfig, ConfigLoaderOptions } from './ConfigInterface';
import { ConfigValidator, isRecord } from './ConfigValidator';
import { ConfigurationError } from '../errors/AppError';

/**
 * 环境变量到配置路径的映射
 */
export const ENV_MAPPINGS: Readonly<Record<string, string>> = {
  APP_ENVIRONMENT: 'app.environment',
  APP_LOG_LEVEL: 'app.logLevel',
  APP_LOG_FORMAT: 'app.logFormat',
  SERVER_PORT: 'server.port',
  SERVER_HOST: 'server.host',
  PUBLIC_BASE_URL: 'server.publicBaseUrl',
  STORAGE_TEMP_PATH: 'storage.tempPath',
  STORAGE_UPLOAD_PATH: 'storage.uploadPath',
  STORAGE_LOG_PATH: 'storage.logPath',
  FFMPEG_PATH: 'ffmpeg.ffmpegPath',
  FFPROBE_PATH: 'ffmpeg.ffprobePath',
  SCREENSHOT_DELIVERY: 'screenshots.delivery',
  SCREENSHOT_CONCURRENCY: 'screenshots.extractionConcurrency'
};

/**
 * 配置加载器
 * 优先级: 环境变量 > config/<env>.json > 内置默认值
 */
export class ConfigLoader {
  private configPath: string;
  private env: NodeJS.ProcessEnv;

  constructor(options: ConfigLoaderOptions = {}) {
    this.env = options.env ?? process.env;
    this.configPath = options.configPath || this.findConfigPath(options.environment);
  }

  /**
   * 向上查找包含config目录的项目根目录
   */
  private getProjectRoot(): string {
    let currentDir = process.cwd();

    while (currentDir && currentDir !== path.dirname(currentDir)) {
      if (fs.existsSync(path.join(currentDir, 'config'))) {
        return currentDir;
      }
      currentDir = path.dirname(currentDir);
    }

    return process.cwd();
  }

  /**
   * 查找配置文件路径
   * 优先级: config/production.json (生产环境) > config/default.json
   */
  private findConfigPath(environment?: string): string {
    const env = environment || this.env.NODE_ENV || 'development';
    const configDir = path.join(this.getProjectRoot(), 'config');

    if (env === 'production') {
      const productionPath = path.join(configDir, 'production.json');
      if (fs.existsSync(productionPath)) {
        return productionPath;
      }
    }

    return path.join(configDir, 'default.json');
  }

  private readJsonFile(filePath: string): unknown {
    try {
      const content = fs.readFileSync(filePath, 'utf-8');
      return JSON.parse(content);
    } catch (error) {
      throw new ConfigurationError(
        `Failed to read JSON file ${filePath}`,
        { filePath },
        error instanceof Error ? error : undefined
      );
    }
  }

  /**
   * 深度合并对象，数组整体替换
   */
  private deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = { ...target };

    for (const [key, value] of Object.entries(source)) {
      const existing = result[key];
      if (isRecord(value) && isRecord(existing)) {
        result[key] = this.deepMerge(existing, value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  /**
   * 加载配置
   */
  async load(options: Pick<ConfigLoaderOptions, 'configPath'> = {}): Promise<AppConfig> {
    const configPath = options.configPath || this.configPath;

    let config: Record<string, unknown> = { ...ConfigValidator.getDefaultConfig() };

    // 1. 合并配置文件
    if (fs.existsSync(configPath)) {
      const fileConfig = this.readJsonFile(configPath);
      if (!isRecord(fileConfig)) {
        throw new ConfigurationError(`Configuration file ${configPath} must contain a JSON object`, { configPath });
      }
      config = this.deepMerge(config, fileConfig);
    }

    // 2. 应用环境变量覆盖
    config = this.applyEnvironmentVariables(config);

    // 3. 验证配置
    const validationResult = ConfigValidator.validate(config);
    if (!validationResult.valid) {
      throw new ConfigurationError('Configuration validation failed', {
        configPath,
        errors: validationResult.errors
      });
    }

    return validationResult.config;
  }

  /**
   * 应用环境变量覆盖
   */
  private applyEnvironmentVariables(config: Record<string, unknown>): Record<string, unknown> {
    let envConfig = config;

    for (const [envVar, configPath] of Object.entries(ENV_MAPPINGS)) {
      const value = this.env[envVar];
      if (value !== undefined && value !== '') {
        envConfig = this.deepMerge(envConfig, this.toNestedObject(configPath, value));
      }
    }

    return envConfig;
  }

  /**
   * 'a.b.c' + value => { a: { b: { c: value } } }
   */
  private toNestedObject(configPath: string, value: string): Record<string, unknown> {
    const keys = configPath.split('.');
    let nested: Record<string, unknown> = { [keys[keys.length - 1]]: value };

    for (let i = keys.length - 2; i >= 0; i--) {
      nested = { [keys[i]]: nested };
    }

    return nested;
  }

  getConfigPath(): string {
    return this.configPath;
  }
}
