import { z } from 'zod';

// Resolved runtime configuration, threaded into every component that touches disk
export const CONFIG_SCHEMA = z.object({
  cacheRoot: z.string().min(1),
  toolchainDir: z.string().min(1),
  toolchainArchive: z.string().min(1),
  systemCompiler: z.string().min(1),
  manifestDir: z.string().min(1).optional(),
});

// Inferred types
export type RpipeConfig = z.infer<typeof CONFIG_SCHEMA>;
