import { loadConfig } from '../../src/config';
import { createWhoisSource, HttpWhoisSource, Port43WhoisSource } from '../../src/whois';

describe('loadConfig', () => {
  it('should use defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      whois: {
        source: 'port43',
        server: undefined,
        port: 43,
        timeoutMs: 10000,
        followReferrals: true,
      },
      http: {
        url: 'https://whoisjson.com/api/v1/whois',
        apiKey: undefined,
      },
      checkDelayMs: 500,
      logLevel: 'warn',
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      WHOIS_SOURCE: 'HTTP',
      WHOIS_SERVER: ' whois.example.test ',
      WHOIS_PORT: '4343',
      WHOIS_TIMEOUT_MS: '2500',
      WHOIS_FOLLOW_REFERRALS: 'false',
      WHOIS_HTTP_URL: 'https://api.example.test/whois',
      WHOIS_HTTP_API_KEY: 'test-secret',
      CHECK_DELAY_MS: '0',
      LOG_LEVEL: 'debug',
    });

    expect(config.whois).toEqual({
      source: 'http',
      server: 'whois.example.test',
      port: 4343,
      timeoutMs: 2500,
      followReferrals: false,
    });
    expect(config.http).toEqual({
      url: 'https://api.example.test/whois',
      apiKey: 'test-secret',
    });
    expect(config.checkDelayMs).toBe(0);
    expect(config.logLevel).toBe('debug');
  });

  it('should fall back on unknown or malformed values', () => {
    const config = loadConfig({
      WHOIS_SOURCE: 'carrier-pigeon',
      WHOIS_PORT: 'forty-three',
      CHECK_DELAY_MS: '-20',
      LOG_LEVEL: 'verbose',
    });

    expect(config.whois.source).toBe('port43');
    expect(config.whois.port).toBe(43);
    expect(config.checkDelayMs).toBe(0);
    expect(config.logLevel).toBe('warn');
  });
});

describe('createWhoisSource', () => {
  it('should build the source named by the config', () => {
    expect(createWhoisSource(loadConfig({}))).toBeInstanceOf(Port43WhoisSource);
    expect(createWhoisSource(loadConfig({ WHOIS_SOURCE: 'http' }))).toBeInstanceOf(HttpWhoisSource);
  });
});
