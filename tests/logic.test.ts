import { loadConfig } from '../src/utils/config';
import { extractFirstNumber, formatByteLength, formatVolumeName } from '../src/utils/logicHelpers';

describe('Logic Helpers', () => {
  describe('formatByteLength', () => {
    it('should keep small counts in bytes', () => {
      expect(formatByteLength(0)).toBe('0 B');
      expect(formatByteLength(1023)).toBe('1023 B');
      expect(formatByteLength(-5)).toBe('0 B');
    });

    it('should scale to larger units with two decimals', () => {
      expect(formatByteLength(1536)).toBe('1.50 KB');
      expect(formatByteLength(1048576)).toBe('1.00 MB');
      expect(formatByteLength(3 * 1024 ** 3)).toBe('3.00 GB');
    });
  });

  describe('formatVolumeName', () => {
    it('should pad volume numbers to three digits', () => {
      expect(formatVolumeName(7)).toBe('Volume 007');
      expect(formatVolumeName(0)).toBe('Volume 000');
      expect(formatVolumeName(128)).toBe('Volume 128');
    });
  });

  describe('extractFirstNumber', () => {
    it('should read the first run of digits', () => {
      expect(extractFirstNumber('p100.html')).toBe(100);
      expect(extractFirstNumber('12abc34')).toBe(12);
    });

    it('should return -1 without digits', () => {
      expect(extractFirstNumber('')).toBe(-1);
      expect(extractFirstNumber('readme')).toBe(-1);
    });
  });
});

describe('Configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.DATA_DIRECTORY;
    delete process.env.DOWNLOAD_RETRY_COUNT;
    delete process.env.PROBLEM_MAX_AGE_HOURS;
    delete process.env.CATEGORY_INDEX_MAX_AGE_HOURS;
    delete process.env.MIN_CACHE_BYTES;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should fall back to defaults', () => {
    const config = loadConfig();

    expect(config.dataDirectory).toBe('./data');
    expect(config.retryCount).toBe(2);
    expect(config.problemMaxAgeMs).toBe(24 * 60 * 60 * 1000);
    expect(config.categoryIndexMaxAgeMs).toBe(9.6 * 60 * 60 * 1000);
    expect(config.minCacheBytes).toBe(100);
  });

  it('should read overrides from the environment', () => {
    process.env.DATA_DIRECTORY = '/tmp/archive';
    process.env.DOWNLOAD_RETRY_COUNT = '5';
    process.env.PROBLEM_MAX_AGE_HOURS = '2';

    const config = loadConfig();

    expect(config.dataDirectory).toBe('/tmp/archive');
    expect(config.retryCount).toBe(5);
    expect(config.problemMaxAgeMs).toBe(2 * 60 * 60 * 1000);
  });

  it('should ignore invalid numbers and negative retry counts', () => {
    process.env.MIN_CACHE_BYTES = 'lots';
    process.env.DOWNLOAD_RETRY_COUNT = '-4';

    const config = loadConfig();

    expect(config.minCacheBytes).toBe(100);
    expect(config.retryCount).toBe(0);
  });
});
