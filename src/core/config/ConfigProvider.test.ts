import { ConfigProvider } from './ConfigProvider';
import { ConfigLoader } from './ConfigLoader';
import { ConfigValidator } from './ConfigValidator';
import { ConfigurationError } from '../errors/AppError';

// Mock dependencies
jest.mock('./ConfigLoader');

describe('ConfigProvider', () => {
  const mockConfig = ConfigValidator.getDefaultConfig();

  beforeEach(() => {
    jest.clearAllMocks();
    ConfigProvider.reset();
    jest.mocked(ConfigLoader.prototype.load).mockResolvedValue(mockConfig);
    jest.mocked(ConfigLoader.prototype.getConfigPath).mockReturnValue('/srv/app/config/default.json');
  });

  describe('initialize', () => {
    it('加载一次后缓存配置', async () => {
      const first = await ConfigProvider.initialize();
      const second = await ConfigProvider.initialize();

      expect(first).toBe(mockConfig);
      expect(second).toBe(mockConfig);
      expect(ConfigLoader.prototype.load).toHaveBeenCalledTimes(1);
    });

    it('把选项传给ConfigLoader', async () => {
      await ConfigProvider.initialize({ configPath: '/tmp/custom.json' });

      expect(ConfigLoader).toHaveBeenCalledWith({ configPath: '/tmp/custom.json' });
    });

    it('reset后重新加载', async () => {
      await ConfigProvider.initialize();
      ConfigProvider.reset();
      await ConfigProvider.initialize();

      expect(ConfigLoader.prototype.load).toHaveBeenCalledTimes(2);
    });
  });

  describe('getConfig', () => {
    it('未初始化时抛出ConfigurationError', () => {
      expect(() => ConfigProvider.getConfig()).toThrow(ConfigurationError);
    });

    it('返回各配置分区', async () => {
      await ConfigProvider.initialize();

      expect(ConfigProvider.getServerConfig()).toBe(mockConfig.server);
      expect(ConfigProvider.getStorageConfig()).toBe(mockConfig.storage);
      expect(ConfigProvider.getFFmpegConfig()).toBe(mockConfig.ffmpeg);
      expect(ConfigProvider.getScreenshotConfig()).toBe(mockConfig.screenshots);
      expect(ConfigProvider.getDeliveryMode()).toBe('archive');
      expect(ConfigProvider.isProduction()).toBe(false);
      expect(ConfigProvider.getConfigPath()).toBe('/srv/app/config/default.json');
    });
  });
});
