import { z } from 'zod';
import { ENV_SCHEMA_WITH_DEFAULTS, type EnvConfig } from '../schemas/env-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

export function parseEnvironment(env: unknown = process.env): EnvConfig {
  try {
    return ENV_SCHEMA_WITH_DEFAULTS.parse(env);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      const fieldErrors = e.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new ValidationError(`Invalid environment variables: ${fieldErrors.join(', ')}`);
    }
    const err = handleUnknownError(e, 'Environment validation');
    throw new ValidationError(`Environment validation failed: ${err.message}`);
  }
}
