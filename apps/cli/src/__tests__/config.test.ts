import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config';

describe('loadConfig', () => {
  it('applies defaults', () => {
    expect(loadConfig({})).toEqual({ privateKey: undefined, logLevel: 'info', output: 'text' });
  });

  it('reads every variable', () => {
    const config = loadConfig({
      ETHKEY_PRIVATE_KEY: '0xabc',
      LOG_LEVEL: 'debug',
      ETHKEY_OUTPUT: 'json',
    });

    expect(config).toEqual({ privateKey: '0xabc', logLevel: 'debug', output: 'json' });
  });

  it('treats an empty private key as unset', () => {
    expect(loadConfig({ ETHKEY_PRIVATE_KEY: '' }).privateKey).toBeUndefined();
  });

  it('rejects an unknown log level', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow(ConfigError);
  });

  it('rejects an unknown output format', () => {
    expect(() => loadConfig({ ETHKEY_OUTPUT: 'yaml' })).toThrow(
      'Invalid ETHKEY_OUTPUT "yaml"; expected text or json'
    );
  });
});
