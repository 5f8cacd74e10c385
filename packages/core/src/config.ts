import type { Environment } from '@record-schema/logger';

export type { Environment };

export interface ValidationEnvironmentConfig {
  /** When false, every validation is a no-op that succeeds */
  validate: boolean;
  emitDiagnostics: boolean;
}

/** Environment-specific configurations */
export const VALIDATION_ENVIRONMENTS: Record<Environment, ValidationEnvironmentConfig> = {
  test: {
    validate: true,
    emitDiagnostics: true,
  },
  development: {
    validate: true,
    emitDiagnostics: true,
  },
  production: {
    validate: false, // Zero-overhead escape hatch
    emitDiagnostics: false,
  },
};

const ENVIRONMENTS: readonly Environment[] = ['test', 'development', 'production'];

function isEnvironment(value: string | undefined): value is Environment {
  return ENVIRONMENTS.some((environment) => environment === value);
}

/**
 * Pick the environment from RECORD_SCHEMA_ENV, then NODE_ENV.
 * Anything unrecognised falls back to development.
 */
export function environmentFromEnv(env: NodeJS.ProcessEnv = process.env): Environment {
  for (const candidate of [env.RECORD_SCHEMA_ENV, env.NODE_ENV]) {
    if (isEnvironment(candidate)) {
      return candidate;
    }
  }
  return 'development';
}
