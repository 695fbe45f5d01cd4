import { ScreenshotScheduler, artifactFilename, formatTimestamp, validateCount, validateQuality } from './ScreenshotScheduler';
import { IFrameExtractor, ok } from './IScreenshotService';
import { InvalidParameterError, UnprocessableMediaError } from '../../core/errors/AppError';
import { getLogger } from '../../core/logging/LogManager';
import { createMockLogger } from '../../core/test/testUtils';

jest.mock('../../core/logging/LogManager');

describe('ScreenshotScheduler', () => {
  let extractor: jest.Mocked<IFrameExtractor>;
  let scheduler: ScreenshotScheduler;
  let mockLogger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    jest.clearAllMocks();
    mockLogger = createMockLogger();
    jest.mocked(getLogger).mockReturnValue(mockLogger);

    extractor = { extractAt: jest.fn().mockResolvedValue(ok(undefined)) };
    scheduler = new ScreenshotScheduler(extractor);
  });

  describe('plan', () => {
    it('33秒视频取10张截图时间点为3到30秒', () => {
      const result = scheduler.plan(33, 10);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.value.map(entry => entry.seekSeconds)).toEqual([3, 6, 9, 12, 15, 18, 21, 24, 27, 30]);
      expect(result.value.map(entry => entry.index)).toEqual([1, 2, 3, 4, 5, 6, 7, 8, 9, 10]);
    });

    it('时间点严格位于(0, duration)内且不递减', () => {
      const duration = 3600.75;
      const count = 37;
      const result = scheduler.plan(duration, count);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.value).toHaveLength(count);
      for (let i = 0; i < result.value.length; i++) {
        const entry = result.value[i];
        expect(entry.offsetSeconds).toBeGreaterThan(0);
        expect(entry.offsetSeconds).toBeLessThan(duration);
        expect(entry.seekSeconds).toBe(Math.trunc(entry.offsetSeconds));
        if (i > 0) {
          expect(entry.seekSeconds).toBeGreaterThanOrEqual(result.value[i - 1].seekSeconds);
        }
      }
    });

    it('单张截图取在视频中点', () => {
      const result = scheduler.plan(100, 1);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.value).toEqual([{ index: 1, offsetSeconds: 50, seekSeconds: 50 }]);
    });

    it('短视频保留重复的时间点并记录警告', () => {
      const result = scheduler.plan(2, 5);

      expect(result.success).toBe(true);
      if (!result.success) return;
      // 2/6, 4/6, 6/6, 8/6, 10/6
      expect(result.value.map(entry => entry.seekSeconds)).toEqual([0, 0, 1, 1, 1]);
      expect(mockLogger.warn).toHaveBeenCalledWith('视频过短，截图时间点有重复', {
        duration: 2,
        count: 5,
        distinctTimestamps: 2
      });
    });

    it('count为0时返回InvalidParameterError', () => {
      const result = scheduler.plan(33, 0);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(InvalidParameterError);
      expect(result.error.statusCode).toBe(400);
    });

    it('count为负数或小数时返回InvalidParameterError', () => {
      for (const count of [-1, 2.5, Number.NaN]) {
        const result = scheduler.plan(33, count);
        expect(result.success).toBe(false);
        if (result.success) continue;
        expect(result.error).toBeInstanceOf(InvalidParameterError);
      }
    });

    it('时长为0或无效时返回UnprocessableMediaError', () => {
      for (const duration of [0, -5, Number.NaN, Number.POSITIVE_INFINITY]) {
        const result = scheduler.plan(duration, 3);
        expect(result.success).toBe(false);
        if (result.success) continue;
        expect(result.error).toBeInstanceOf(UnprocessableMediaError);
        expect(result.error.statusCode).toBe(422);
      }
    });

    it('count先于时长校验', () => {
      const result = scheduler.plan(0, 0);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(InvalidParameterError);
    });
  });

  describe('extractAt', () => {
    it('把参数原样交给截帧器', async () => {
      const result = await scheduler.extractAt('/jobs/a/input.mp4', 12, 2, '/jobs/a/screenshot_001.jpg');

      expect(result).toEqual({ success: true, value: undefined });
      expect(extractor.extractAt).toHaveBeenCalledWith('/jobs/a/input.mp4', 12, 2, '/jobs/a/screenshot_001.jpg');
    });

    it('画质越界时不调用截帧器', async () => {
      const result = await scheduler.extractAt('/jobs/a/input.mp4', 12, 32, '/jobs/a/screenshot_001.jpg');

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error).toBeInstanceOf(InvalidParameterError);
      expect(extractor.extractAt).not.toHaveBeenCalled();
    });
  });
});

describe('validateCount', () => {
  it('接受不超过上限的正整数', () => {
    expect(validateCount(1)).toEqual({ success: true, value: 1 });
    expect(validateCount(100, 100)).toEqual({ success: true, value: 100 });
  });

  it('超过上限时返回错误', () => {
    const result = validateCount(101, 100);

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.message).toBe('Screenshot count must not exceed 100');
    expect(result.error.details).toEqual({ count: 101, maxCount: 100 });
  });
});

describe('validateQuality', () => {
  it('接受1到31的整数', () => {
    expect(validateQuality(1).success).toBe(true);
    expect(validateQuality(31).success).toBe(true);
  });

  it('拒绝范围外的值和小数', () => {
    for (const quality of [0, 32, 2.5, -1]) {
      const result = validateQuality(quality);
      expect(result.success).toBe(false);
      if (result.success) continue;
      expect(result.error.message).toBe('Quality must be an integer between 1 and 31');
    }
  });
});

describe('formatTimestamp', () => {
  it('格式化为H:MM:SS', () => {
    expect(formatTimestamp(0)).toBe('0:00:00');
    expect(formatTimestamp(30)).toBe('0:00:30');
    expect(formatTimestamp(61)).toBe('0:01:01');
    expect(formatTimestamp(3725)).toBe('1:02:05');
    expect(formatTimestamp(36000)).toBe('10:00:00');
  });

  it('截断小数并把负数视为0', () => {
    expect(formatTimestamp(59.99)).toBe('0:00:59');
    expect(formatTimestamp(-3)).toBe('0:00:00');
  });
});

describe('artifactFilename', () => {
  it('序号补齐三位', () => {
    expect(artifactFilename(1)).toBe('screenshot_001.jpg');
    expect(artifactFilename(42)).toBe('screenshot_042.jpg');
    expect(artifactFilename(100)).toBe('screenshot_100.jpg');
  });
});
