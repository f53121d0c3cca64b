import { z } from 'zod';
import { CLI_OPTIONS_SCHEMA, type CliOptions } from '../schemas/cli-schemas';
import { InputFormat } from '../codegen/formats';
import { ValidationError, handleUnknownError } from '../errors/index';

export function parseCliOptions(raw: unknown): CliOptions {
  try {
    return CLI_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      const issues = e.issues.map((issue) => issue.message);
      throw new ValidationError(`Invalid CLI options: ${issues.join(', ')}`);
    }
    const err = handleUnknownError(e, 'CLI option parsing');
    throw new ValidationError(`CLI option parsing failed: ${err.message}`);
  }
}

export function inputFormatFromOptions(options: CliOptions): InputFormat {
  if (options.parseCsv) return InputFormat.Csv;
  if (options.parseTsv) return InputFormat.Tsv;
  if (options.parseJson) return InputFormat.JsonLines;
  return InputFormat.Lines;
}
