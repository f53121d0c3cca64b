import { z } from 'zod';
import { OUTPUT_FORMAT_NAMES } from '../codegen/formats';

// CLI options schema for command line argument validation
export const CLI_OPTIONS_SCHEMA = z
  .object({
    parseCsv: z.boolean().default(false),
    parseTsv: z.boolean().default(false),
    parseJson: z.boolean().default(false),
    format: z.enum(OUTPUT_FORMAT_NAMES).optional(),
    showSource: z.boolean().default(false),
    clearCache: z.boolean().default(false),
    cacheStats: z.boolean().default(false),
    verbose: z.boolean().default(false),
    stats: z.boolean().default(false),
  })
  .refine((opts) => [opts.parseCsv, opts.parseTsv, opts.parseJson].filter(Boolean).length <= 1, {
    message: 'Only one of --parse-csv, --parse-tsv and --parse-json may be given',
    path: ['parseCsv'],
  });

// Inferred types
export type CliOptions = z.infer<typeof CLI_OPTIONS_SCHEMA>;
