export enum InputFormat {
  Lines = 'lines',
  Csv = 'csv',
  Tsv = 'tsv',
  JsonLines = 'jsonl',
}

export enum OutputFormat {
  Debug = 'debug',
  Json = 'json',
  JsonLines = 'jsonl',
  Csv = 'csv',
  Table = 'table',
}

/**
 * Where the generated program reads from. No files means standard input.
 */
export interface InputSource {
  files: string[];
  format: InputFormat;
}

// Names accepted by --format, including aliases
export const OUTPUT_FORMAT_NAMES = ['debug', 'json', 'jsonl', 'jsonlines', 'csv', 'table'] as const;
export type OutputFormatName = (typeof OUTPUT_FORMAT_NAMES)[number];

const OUTPUT_FORMAT_ALIASES: Record<OutputFormatName, OutputFormat> = {
  debug: OutputFormat.Debug,
  json: OutputFormat.Json,
  jsonl: OutputFormat.JsonLines,
  jsonlines: OutputFormat.JsonLines,
  csv: OutputFormat.Csv,
  table: OutputFormat.Table,
};

export function isOutputFormatName(value: string): value is OutputFormatName {
  return (OUTPUT_FORMAT_NAMES as readonly string[]).includes(value);
}

export function parseOutputFormat(value: string): OutputFormat | undefined {
  return isOutputFormatName(value) ? OUTPUT_FORMAT_ALIASES[value] : undefined;
}

/**
 * Terminals get the human-readable debug rendering, pipes get JSON lines.
 */
export function defaultOutputFormat(isTerminal: boolean): OutputFormat {
  return isTerminal ? OutputFormat.Debug : OutputFormat.JsonLines;
}

export function isStdinSource(source: InputSource): boolean {
  return source.files.length === 0;
}
