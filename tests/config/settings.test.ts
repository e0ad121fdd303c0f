import { loadSettings } from '../../src/config/settings';
import { ConfigurationError } from '../../src/errors';

describe('loadSettings', () => {
  it('should apply defaults to an empty environment', () => {
    const settings = loadSettings({});

    expect(settings.crawl).toEqual({
      requestDelayMs: 2000,
      settleDelayMs: 2000,
      maxRetries: 5,
      navigationTimeoutMs: 30000,
      headless: true,
      chromiumPath: undefined,
      completeRowImpliesVacancy: true,
    });
    expect(settings.resultsDir).toBe('results');
    expect(settings.ntfyServer).toBe('https://ntfy.sh');
    expect(settings.ntfyTopic).toBeUndefined();
    expect(settings.checkCron).toBe('0 */2 * * *');
    expect(settings.checkTimezone).toBe('Asia/Tokyo');
    expect(settings.targetUrlPattern.test('https://www.ur-net.go.jp/chintai/a.html')).toBe(true);
  });

  it('should read values from the environment', () => {
    const settings = loadSettings({
      REQUEST_DELAY_SECONDS: '0.5',
      MAX_RETRIES: '2',
      HEADLESS: 'false',
      COMPLETE_ROW_IMPLIES_VACANCY: 'no',
      RESULTS_DIR: '/var/lib/vacancy',
      TARGETS_FILE: 'targets.csv',
      NTFY_TOPIC: 'test-topic',
      TARGET_URL_PATTERN: 'https://example\\.test/\\S+',
    });

    expect(settings.crawl.requestDelayMs).toBe(500);
    expect(settings.crawl.maxRetries).toBe(2);
    expect(settings.crawl.headless).toBe(false);
    expect(settings.crawl.completeRowImpliesVacancy).toBe(false);
    expect(settings.resultsDir).toBe('/var/lib/vacancy');
    expect(settings.targetsFile).toBe('targets.csv');
    expect(settings.ntfyTopic).toBe('test-topic');
    expect(settings.targetUrlPattern.flags).toBe('g');
    expect('a https://example.test/x b'.match(settings.targetUrlPattern)).toEqual(['https://example.test/x']);
  });

  it('should reject malformed numbers', () => {
    expect(() => loadSettings({ MAX_RETRIES: 'three' })).toThrow(ConfigurationError);
    expect(() => loadSettings({ MAX_RETRIES: '0' })).toThrow('MAX_RETRIES must be a number >= 1 (got "0")');
    expect(() => loadSettings({ REQUEST_DELAY_SECONDS: '-1' })).toThrow(ConfigurationError);
  });

  it('should reject malformed booleans', () => {
    expect(() => loadSettings({ HEADLESS: 'sometimes' })).toThrow('HEADLESS must be true or false (got "sometimes")');
  });

  it('should reject an invalid URL pattern', () => {
    expect(() => loadSettings({ TARGET_URL_PATTERN: '([' })).toThrow(ConfigurationError);
  });
});
