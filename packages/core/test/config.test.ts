import { describe, expect, it } from 'vitest';
import { environmentFromEnv, VALIDATION_ENVIRONMENTS } from '../src/config.js';

describe('environmentFromEnv', () => {
  it('should prefer RECORD_SCHEMA_ENV over NODE_ENV', () => {
    expect(environmentFromEnv({ RECORD_SCHEMA_ENV: 'production', NODE_ENV: 'test' })).toBe('production');
  });

  it('should fall back to NODE_ENV', () => {
    expect(environmentFromEnv({ NODE_ENV: 'test' })).toBe('test');
  });

  it('should default unknown values to development', () => {
    expect(environmentFromEnv({ RECORD_SCHEMA_ENV: 'staging', NODE_ENV: 'qa' })).toBe('development');
    expect(environmentFromEnv({})).toBe('development');
  });
});

describe('VALIDATION_ENVIRONMENTS', () => {
  it('should only skip validation in production', () => {
    expect(VALIDATION_ENVIRONMENTS.test.validate).toBe(true);
    expect(VALIDATION_ENVIRONMENTS.development.validate).toBe(true);
    expect(VALIDATION_ENVIRONMENTS.production).toEqual({ validate: false, emitDiagnostics: false });
  });
});
