import { z } from 'zod';
import { DEFAULT_SYSTEM_COMPILER } from '../config/constants';

const optionalPath = z.string().trim().min(1).optional();

// Environment variables rpipe reads; everything else in process.env is dropped
export const ENV_SCHEMA = z.object({
  RPIPE_CACHE_DIR: optionalPath,
  RPIPE_RUSTC: z.string().trim().min(1).default(DEFAULT_SYSTEM_COMPILER),
  RPIPE_TOOLCHAIN_ARCHIVE: optionalPath,
  CARGO_MANIFEST_DIR: optionalPath,
  XDG_CACHE_HOME: optionalPath,
  LOCALAPPDATA: optionalPath,
});

// Empty strings behave as unset, the way shells usually export them
export const ENV_SCHEMA_WITH_DEFAULTS = z.preprocess(
  (data: unknown) => {
    if (typeof data !== 'object' || data === null) {
      return data;
    }
    const cleaned: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (value !== '') cleaned[key] = value;
    }
    return cleaned;
  },
  ENV_SCHEMA
);

// Inferred types
export type EnvConfig = z.infer<typeof ENV_SCHEMA>;
