import { AppConfig, ConfigLoaderOptions, DeliveryMode, FFmpegConfig, ScreenshotConfig, ServerConfig, StorageConfig } from './ConfigInterface';
import { ConfigLoader } from './ConfigLoader';
import { ConfigurationError } from '../errors/AppError';

/**
 * 配置提供者
 * 提供全局配置访问
 */
export class ConfigProvider {
  private static config: AppConfig | null = null;
  private static loader: ConfigLoader | null = null;

  /**
   * 初始化配置
   */
  static async initialize(options?: ConfigLoaderOptions): Promise<AppConfig> {
    if (!this.loader) {
      this.loader = new ConfigLoader(options);
    }

    if (!this.config) {
      this.config = await this.loader.load();
    }

    return this.config;
  }

  /**
   * 获取配置
   */
  static getConfig(): AppConfig {
    if (!this.config) {
      throw new ConfigurationError('Configuration not initialized. Call initialize() first.');
    }
    return this.config;
  }

  /**
   * 清空已加载的配置，下次initialize重新加载
   */
  static reset(): void {
    this.config = null;
    this.loader = null;
  }

  static getConfigPath(): string | undefined {
    return this.loader?.getConfigPath();
  }

  static getServerConfig(): ServerConfig {
    return this.getConfig().server;
  }

  static getStorageConfig(): StorageConfig {
    return this.getConfig().storage;
  }

  static getFFmpegConfig(): FFmpegConfig {
    return this.getConfig().ffmpeg;
  }

  static getScreenshotConfig(): ScreenshotConfig {
    return this.getConfig().screenshots;
  }

  static getDeliveryMode(): DeliveryMode {
    return this.getScreenshotConfig().delivery;
  }

  static isProduction(): boolean {
    return this.getConfig().app.environment === 'production';
  }
}
