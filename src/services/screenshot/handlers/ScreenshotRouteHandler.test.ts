import { parseIntegerParam } from './ScreenshotRouteHandler';
import { InvalidParameterError } from '../../../core/errors/AppError';

describe('parseIntegerParam', () => {
  it('缺省时返回默认值', () => {
    expect(parseIntegerParam(undefined, 'num_screenshots', 10)).toEqual({ success: true, value: 10 });
    expect(parseIntegerParam('', 'num_screenshots', 10)).toEqual({ success: true, value: 10 });
  });

  it('解析整数字符串', () => {
    expect(parseIntegerParam('25', 'num_screenshots', 10)).toEqual({ success: true, value: 25 });
    expect(parseIntegerParam(' 7 ', 'quality', 2)).toEqual({ success: true, value: 7 });
    expect(parseIntegerParam('-3', 'num_screenshots', 10)).toEqual({ success: true, value: -3 });
  });

  it('拒绝小数、非数字和重复参数', () => {
    for (const value of ['2.5', 'ten', '1e3', ['1', '2']]) {
      const result = parseIntegerParam(value, 'num_screenshots', 10);
      expect(result.success).toBe(false);
      if (result.success) continue;
      expect(result.error).toBeInstanceOf(InvalidParameterError);
      expect(result.error.message).toBe('num_screenshots must be an integer');
    }
  });
});
