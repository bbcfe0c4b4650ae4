import { DEFAULT_SDN_SOURCE_URL, parseConfig } from '../../src/config/validate';
import { ConfigurationError } from '../../src/errors';

describe('parseConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = parseConfig({});

    expect(config).toEqual({
      env: 'development',
      port: 3020,
      host: '0.0.0.0',
      trustProxy: false,
      corsOrigin: '*',
      sdn: {
        sourceUrl: DEFAULT_SDN_SOURCE_URL,
        fetchTimeoutMs: 30000,
        maxDownloadBytes: 104857600,
        cacheTtlMs: 21600000,
        refreshBackoffMs: 60000,
        refreshMaxBackoffMs: 900000,
        stalePolicy: 'serve-stale',
        warmOnStart: true,
        maxSkipRatio: 0.1,
        resultLimit: 100
      }
    });
  });

  it('coerces numeric and boolean variables', () => {
    const config = parseConfig({
      PORT: '8080',
      TRUST_PROXY: 'true',
      SDN_CACHE_TTL_MS: '3600000',
      SDN_RESULT_LIMIT: '25',
      SDN_MAX_SKIP_RATIO: '0.25',
      SDN_WARM_ON_START: 'false',
      SDN_STALE_POLICY: 'wait-for-refresh',
      SDN_SOURCE_URL: 'file:///var/data/targets.simple.csv'
    });

    expect(config.port).toBe(8080);
    expect(config.trustProxy).toBe(true);
    expect(config.sdn).toMatchObject({
      cacheTtlMs: 3600000,
      resultLimit: 25,
      maxSkipRatio: 0.25,
      warmOnStart: false,
      stalePolicy: 'wait-for-refresh',
      sourceUrl: 'file:///var/data/targets.simple.csv'
    });
  });

  it('lists every invalid variable', () => {
    const error = (() => {
      try {
        parseConfig({ PORT: 'eighty', SDN_STALE_POLICY: 'sometimes', SDN_WARM_ON_START: 'yes' });
      } catch (e) {
        return e;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toHaveProperty('issues', expect.arrayContaining([
      expect.objectContaining({ field: 'PORT' }),
      expect.objectContaining({ field: 'SDN_STALE_POLICY' }),
      expect.objectContaining({ field: 'SDN_WARM_ON_START' })
    ]));
    expect(error).toHaveProperty('isOperational', false);
  });

  it('rejects a backoff ceiling below the backoff', () => {
    expect(() => parseConfig({
      SDN_REFRESH_BACKOFF_MS: '5000',
      SDN_REFRESH_MAX_BACKOFF_MS: '1000'
    })).toThrow('Invalid configuration: SDN_REFRESH_MAX_BACKOFF_MS (must be greater than or equal to SDN_REFRESH_BACKOFF_MS)');
  });

  it.each(['SDN_REFRESH_BACKOFF_MS', 'SDN_REFRESH_MAX_BACKOFF_MS'])('rejects %s below one second', (name) => {
    const error = (() => {
      try {
        parseConfig({ [name]: '0' });
      } catch (e) {
        return e;
      }
      return null;
    })();

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error).toHaveProperty('issues', [expect.objectContaining({ field: name, code: 'too_small' })]);
  });

  it('rejects a skip ratio outside 0..1', () => {
    expect(() => parseConfig({ SDN_MAX_SKIP_RATIO: '1.5' })).toThrow(ConfigurationError);
  });
});
