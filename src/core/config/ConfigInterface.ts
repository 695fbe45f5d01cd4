/**
 * 应用配置接口定义
 */
import { LogLevel } from '../logging/LoggerInterface';

export type Environment = 'development' | 'test' | 'production';

export type LogFormat = 'text' | 'json';

/**
 * 截图交付方式
 * - archive: 打包为zip流式返回，发送完成后删除任务目录
 * - static: 返回截图URL列表，任务目录保留到显式清理
 */
export type DeliveryMode = 'archive' | 'static';

// HTTP服务配置
export interface ServerConfig {
  port: number;
  host: string;
  /** 静态交付时截图URL的前缀，为空时按请求的Host推导 */
  publicBaseUrl: string;
}

// 存储配置
export interface StorageConfig {
  /** 任务工作目录根，启动时清空重建 */
  tempPath: string;
  /** 上传暂存目录，启动时清空重建 */
  uploadPath: string;
  logPath: string;
}

// FFmpeg配置
export interface FFmpegConfig {
  ffmpegPath: string;
  ffprobePath: string;
  probeTimeoutMs: number;
  extractTimeoutMs: number;
}

// 截图配置
export interface ScreenshotConfig {
  defaultCount: number;
  defaultQuality: number;
  maxCount: number;
  allowedExtensions: string[];
  delivery: DeliveryMode;
  deleteInputOnSuccess: boolean;
  extractionConcurrency: number;
  maxUploadBytes: number;
}

// 应用基础配置
export interface AppConfig {
  app: {
    name: string;
    version: string;
    environment: Environment;
    logLevel: LogLevel;
    logFormat: LogFormat;
  };
  server: ServerConfig;
  storage: StorageConfig;
  ffmpeg: FFmpegConfig;
  screenshots: ScreenshotConfig;
}

export interface ConfigValidationIssue {
  path: string;
  message: string;
  type: 'required' | 'type' | 'range';
}

// 配置验证结果
export type ValidationResult =
  | { valid: true; errors: []; config: AppConfig }
  | { valid: false; errors: ConfigValidationIssue[]; config: null };

// 配置加载选项
export interface ConfigLoaderOptions {
  configPath?: string;
  environment?: string;
  env?: NodeJS.ProcessEnv;
}
