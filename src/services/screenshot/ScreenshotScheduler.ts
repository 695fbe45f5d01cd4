/**
 * 截图调度
 * 把时长等分为 count + 1 段，第 i 张截图取在 i * duration / (count + 1)，
 * 首尾两张都不会落在视频的 0 点或结尾
 */
import { InvalidParameterError, UnprocessableMediaError } from '../../core/errors/AppError';
import { getLogger } from '../../core/logging/LogManager';
import { IFrameExtractor, PlanEntry, Result, fail, ok } from './IScreenshotService';

export const MIN_QUALITY = 1;
export const MAX_QUALITY = 31;

export function validateCount(count: number, maxCount?: number): Result<number, InvalidParameterError> {
  if (!Number.isInteger(count) || count <= 0) {
    return fail(new InvalidParameterError('Screenshot count must be a positive integer', { count }));
  }
  if (maxCount !== undefined && count > maxCount) {
    return fail(new InvalidParameterError(`Screenshot count must not exceed ${maxCount}`, { count, maxCount }));
  }
  return ok(count);
}

/**
 * 画质为ffmpeg的 -q:v，数值越小画质越高
 */
export function validateQuality(quality: number): Result<number, InvalidParameterError> {
  if (!Number.isInteger(quality) || quality < MIN_QUALITY || quality > MAX_QUALITY) {
    return fail(new InvalidParameterError(
      `Quality must be an integer between ${MIN_QUALITY} and ${MAX_QUALITY}`,
      { quality }
    ));
  }
  return ok(quality);
}

/**
 * 秒数 => H:MM:SS
 */
export function formatTimestamp(totalSeconds: number): string {
  const seconds = Math.max(0, Math.trunc(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  const secs = seconds % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
}

/**
 * screenshot_001.jpg
 */
export function artifactFilename(index: number): string {
  return `screenshot_${String(index).padStart(3, '0')}.jpg`;
}

export class ScreenshotScheduler {
  private logger = getLogger('ScreenshotScheduler');

  constructor(private readonly extractor: IFrameExtractor) {}

  /**
   * 计算截图时间点
   * 短视频（duration < count + 1 秒）取整后可能出现重复时间点，保留不去重，每个时间点各截一次
   */
  plan(duration: number, count: number): Result<PlanEntry[]> {
    const countResult = validateCount(count);
    if (!countResult.success) {
      return countResult;
    }

    if (!Number.isFinite(duration) || duration <= 0) {
      return fail(new UnprocessableMediaError('Media has no usable duration', { duration }));
    }

    const entries: PlanEntry[] = [];
    for (let index = 1; index <= count; index++) {
      const offsetSeconds = (index * duration) / (count + 1);
      entries.push({ index, offsetSeconds, seekSeconds: Math.trunc(offsetSeconds) });
    }

    const distinct = new Set(entries.map(entry => entry.seekSeconds)).size;
    if (distinct < entries.length) {
      this.logger.warn('视频过短，截图时间点有重复', { duration, count, distinctTimestamps: distinct });
    }

    return ok(entries);
  }

  /**
   * 在指定时间点截取一帧写入 destinationPath
   */
  async extractAt(mediaPath: string, seekSeconds: number, quality: number, destinationPath: string): Promise<Result<void>> {
    const qualityResult = validateQuality(quality);
    if (!qualityResult.success) {
      return qualityResult;
    }

    return this.extractor.extractAt(mediaPath, seekSeconds, quality, destinationPath);
  }
}
