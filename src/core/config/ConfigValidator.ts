import { AppConfig, ConfigValidationIssue, ValidationResult } from './ConfigInterface';
import { isLogLevel, LogLevel } from '../logging/LoggerInterface';

type UnknownRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

interface NumberRule {
  min?: number;
  max?: number;
  integer?: boolean;
}

/**
 * 逐字段读取并收集错误
 */
class FieldReader {
  readonly errors: ConfigValidationIssue[] = [];

  section(root: UnknownRecord, key: string): UnknownRecord {
    const value = root[key];
    if (!isRecord(value)) {
      this.errors.push({ path: key, message: `${key} configuration is required`, type: 'required' });
      return {};
    }
    return value;
  }

  private missing(path: string, value: unknown): boolean {
    if (value === undefined || value === null || value === '') {
      this.errors.push({ path, message: `${path} is required`, type: 'required' });
      return true;
    }
    return false;
  }

  string(section: UnknownRecord, path: string, key: string, allowEmpty = false): string {
    const value = section[key];
    if (allowEmpty && value === '') {
      return '';
    }
    if (this.missing(`${path}.${key}`, value)) {
      return '';
    }
    if (typeof value !== 'string') {
      this.errors.push({ path: `${path}.${key}`, message: `${path}.${key} must be a string`, type: 'type' });
      return '';
    }
    return value;
  }

  number(section: UnknownRecord, path: string, key: string, rule: NumberRule = {}): number {
    const raw = section[key];
    const fullPath = `${path}.${key}`;
    if (this.missing(fullPath, raw)) {
      return 0;
    }

    // 环境变量覆盖的值为字符串
    const value = typeof raw === 'string' && raw.trim() !== '' ? Number(raw) : raw;
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      this.errors.push({ path: fullPath, message: `${fullPath} must be a number`, type: 'type' });
      return 0;
    }
    if (rule.integer && !Number.isInteger(value)) {
      this.errors.push({ path: fullPath, message: `${fullPath} must be an integer`, type: 'type' });
    }
    if (rule.min !== undefined && value < rule.min) {
      this.errors.push({ path: fullPath, message: `${fullPath} must be >= ${rule.min}`, type: 'range' });
    }
    if (rule.max !== undefined && value > rule.max) {
      this.errors.push({ path: fullPath, message: `${fullPath} must be <= ${rule.max}`, type: 'range' });
    }
    return value;
  }

  boolean(section: UnknownRecord, path: string, key: string): boolean {
    const raw = section[key];
    const fullPath = `${path}.${key}`;
    if (raw === 'true' || raw === 'false') {
      return raw === 'true';
    }
    if (typeof raw !== 'boolean') {
      this.errors.push({ path: fullPath, message: `${fullPath} must be a boolean`, type: 'type' });
      return false;
    }
    return raw;
  }

  oneOf<T extends string>(section: UnknownRecord, path: string, key: string, allowed: readonly T[]): T {
    const value = section[key];
    const fullPath = `${path}.${key}`;
    const match = allowed.find(candidate => candidate === value);
    if (match === undefined) {
      this.errors.push({ path: fullPath, message: `${fullPath} must be one of: ${allowed.join(', ')}`, type: 'type' });
      return allowed[0];
    }
    return match;
  }

  logLevel(section: UnknownRecord, path: string, key: string): LogLevel {
    const value = section[key];
    if (!isLogLevel(value)) {
      this.errors.push({ path: `${path}.${key}`, message: `${path}.${key} must be a log level`, type: 'type' });
      return LogLevel.INFO;
    }
    return value;
  }

  stringArray(section: UnknownRecord, path: string, key: string): string[] {
    const value = section[key];
    const fullPath = `${path}.${key}`;
    if (!Array.isArray(value) || value.length === 0) {
      this.errors.push({ path: fullPath, message: `${fullPath} must be a non-empty list`, type: 'required' });
      return [];
    }
    const strings = value.filter((item): item is string => typeof item === 'string');
    if (strings.length !== value.length) {
      this.errors.push({ path: fullPath, message: `${fullPath} must contain only strings`, type: 'type' });
    }
    return strings;
  }
}

/**
 * 配置验证器
 */
export class ConfigValidator {
  /**
   * 验证配置，返回强类型配置或错误列表
   */
  static validate(config: unknown): ValidationResult {
    if (!isRecord(config)) {
      return {
        valid: false,
        errors: [{ path: '', message: 'Configuration must be an object', type: 'type' }],
        config: null
      };
    }

    const reader = new FieldReader();

    const app = reader.section(config, 'app');
    const server = reader.section(config, 'server');
    const storage = reader.section(config, 'storage');
    const ffmpeg = reader.section(config, 'ffmpeg');
    const screenshots = reader.section(config, 'screenshots');

    const validated: AppConfig = {
      app: {
        name: reader.string(app, 'app', 'name'),
        version: reader.string(app, 'app', 'version'),
        environment: reader.oneOf(app, 'app', 'environment', ['development', 'test', 'production'] as const),
        logLevel: reader.logLevel(app, 'app', 'logLevel'),
        logFormat: reader.oneOf(app, 'app', 'logFormat', ['text', 'json'] as const)
      },
      server: {
        port: reader.number(server, 'server', 'port', { min: 0, max: 65535, integer: true }),
        host: reader.string(server, 'server', 'host'),
        publicBaseUrl: reader.string(server, 'server', 'publicBaseUrl', true)
      },
      storage: {
        tempPath: reader.string(storage, 'storage', 'tempPath'),
        uploadPath: reader.string(storage, 'storage', 'uploadPath'),
        logPath: reader.string(storage, 'storage', 'logPath')
      },
      ffmpeg: {
        ffmpegPath: reader.string(ffmpeg, 'ffmpeg', 'ffmpegPath'),
        ffprobePath: reader.string(ffmpeg, 'ffmpeg', 'ffprobePath'),
        probeTimeoutMs: reader.number(ffmpeg, 'ffmpeg', 'probeTimeoutMs', { min: 1, integer: true }),
        extractTimeoutMs: reader.number(ffmpeg, 'ffmpeg', 'extractTimeoutMs', { min: 1, integer: true })
      },
      screenshots: {
        defaultCount: reader.number(screenshots, 'screenshots', 'defaultCount', { min: 1, integer: true }),
        defaultQuality: reader.number(screenshots, 'screenshots', 'defaultQuality', { min: 1, max: 31, integer: true }),
        maxCount: reader.number(screenshots, 'screenshots', 'maxCount', { min: 1, integer: true }),
        allowedExtensions: reader.stringArray(screenshots, 'screenshots', 'allowedExtensions')
          .map(extension => extension.toLowerCase()),
        delivery: reader.oneOf(screenshots, 'screenshots', 'delivery', ['archive', 'static'] as const),
        deleteInputOnSuccess: reader.boolean(screenshots, 'screenshots', 'deleteInputOnSuccess'),
        extractionConcurrency: reader.number(screenshots, 'screenshots', 'extractionConcurrency', { min: 1, integer: true }),
        maxUploadBytes: reader.number(screenshots, 'screenshots', 'maxUploadBytes', { min: 1, integer: true })
      }
    };

    if (validated.screenshots.defaultCount > validated.screenshots.maxCount) {
      reader.errors.push({
        path: 'screenshots.defaultCount',
        message: 'screenshots.defaultCount must not exceed screenshots.maxCount',
        type: 'range'
      });
    }

    if (reader.errors.length > 0) {
      return { valid: false, errors: reader.errors, config: null };
    }

    return { valid: true, errors: [], config: validated };
  }

  /**
   * 获取默认配置
   */
  static getDefaultConfig(): AppConfig {
    return {
      app: {
        name: 'video-screenshot-service',
        version: '1.0.0',
        environment: 'development',
        logLevel: LogLevel.INFO,
        logFormat: 'text'
      },
      server: {
        port: 8000,
        host: '0.0.0.0',
        publicBaseUrl: ''
      },
      storage: {
        tempPath: './temp/jobs',
        uploadPath: './temp/uploads',
        logPath: './logs'
      },
      ffmpeg: {
        ffmpegPath: 'ffmpeg',
        ffprobePath: 'ffprobe',
        probeTimeoutMs: 30000,
        extractTimeoutMs: 60000
      },
      screenshots: {
        defaultCount: 10,
        defaultQuality: 2,
        maxCount: 100,
        allowedExtensions: ['.mp4', '.avi', '.mov', '.mkv'],
        delivery: 'archive',
        deleteInputOnSuccess: true,
        extractionConcurrency: 1,
        maxUploadBytes: 2 * 1024 * 1024 * 1024
      }
    };
  }
}
