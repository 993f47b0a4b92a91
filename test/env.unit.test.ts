import { describe, expect, it } from 'vitest';

import { parseEnv } from '../src/lib/env';
import { InvalidEnvironmentError } from '../src/lib/errors';
import { captureError } from './links';

describe('parseEnv', () => {
  it('applies defaults', () => {
    const env = parseEnv({});

    expect(env).toMatchObject({
      LOG_LEVEL: 'warn',
      VLESS2JSON_STRICT: false,
      VLESS2JSON_PRESET: 'basic',
      VLESS2JSON_OUTPUT: 'config.json',
      VLESS2JSON_ENGINE_LOGLEVEL: 'warning',
    });
    expect(env.LOG_FILE).toBeUndefined();
  });

  it('reads booleans, presets and treats a blank log file as unset', () => {
    const env = parseEnv({
      VLESS2JSON_STRICT: '1',
      VLESS2JSON_PRESET: 'full',
      VLESS2JSON_OUTPUT: '/etc/xray/config.json',
      LOG_FILE: '  ',
    });

    expect(env.VLESS2JSON_STRICT).toBe(true);
    expect(env.VLESS2JSON_PRESET).toBe('full');
    expect(env.VLESS2JSON_OUTPUT).toBe('/etc/xray/config.json');
    expect(env.LOG_FILE).toBeUndefined();
  });

  it('names every invalid variable', () => {
    const error = captureError(() => parseEnv({ VLESS2JSON_PRESET: 'huge', LOG_LEVEL: 'loud' }));

    expect(error).toBeInstanceOf(InvalidEnvironmentError);
    expect(error).toMatchObject({
      code: 'INVALID_ENVIRONMENT',
      field: 'LOG_LEVEL, VLESS2JSON_PRESET',
      message: 'Invalid environment variables',
    });
  });
});
