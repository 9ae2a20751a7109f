import { AppConfigService, loadAppConfig } from './app-config.service.js';

describe('loadAppConfig', () => {
  it('empty env → defaults', () => {
    expect(loadAppConfig({})).toEqual({
      port: 3000,
      host: '0.0.0.0',
      logLevels: ['log', 'warn', 'error'],
      version: '0.1.0',
    });
  });

  it('reads overrides', () => {
    expect(
      loadAppConfig({
        PORT: '8080',
        HOST: '127.0.0.1',
        LOG_LEVELS: 'debug, log,,error',
        APP_VERSION: '1.2.3',
      }),
    ).toEqual({
      port: 8080,
      host: '127.0.0.1',
      logLevels: ['debug', 'log', 'error'],
      version: '1.2.3',
    });
  });

  it('non-numeric PORT → throws naming PORT', () => {
    expect(() => loadAppConfig({ PORT: 'abc' })).toThrow(
      /Invalid environment configuration: PORT:/,
    );
  });

  it('PORT out of range → throws', () => {
    expect(() => loadAppConfig({ PORT: '70000' })).toThrow(/PORT/);
  });

  it('unknown log level → throws naming LOG_LEVELS', () => {
    expect(() => loadAppConfig({ LOG_LEVELS: 'log,loud' })).toThrow(
      /LOG_LEVELS\.1:/,
    );
  });
});

describe('AppConfigService', () => {
  const saved = process.env.APP_VERSION;

  afterEach(() => {
    if (saved === undefined) delete process.env.APP_VERSION;
    else process.env.APP_VERSION = saved;
  });

  it('reads process.env at construction', () => {
    process.env.APP_VERSION = '9.9.9';
    expect(new AppConfigService().get().version).toBe('9.9.9');
  });
});
