import { describe, it, expect } from 'vitest';
import {
  InputFormat,
  OutputFormat,
  defaultOutputFormat,
  isOutputFormatName,
  isStdinSource,
  parseOutputFormat,
} from '../src/codegen/formats';

describe('Formats', () => {
  it('parses every accepted output format name', () => {
    expect(parseOutputFormat('debug')).toBe(OutputFormat.Debug);
    expect(parseOutputFormat('json')).toBe(OutputFormat.Json);
    expect(parseOutputFormat('jsonl')).toBe(OutputFormat.JsonLines);
    expect(parseOutputFormat('csv')).toBe(OutputFormat.Csv);
    expect(parseOutputFormat('table')).toBe(OutputFormat.Table);
  });

  it('accepts jsonlines as an alias of jsonl', () => {
    expect(parseOutputFormat('jsonlines')).toBe(OutputFormat.JsonLines);
  });

  it('rejects unknown names', () => {
    expect(parseOutputFormat('yaml')).toBeUndefined();
    expect(isOutputFormatName('JSON')).toBe(false);
  });

  it('defaults to debug on a terminal and JSON lines otherwise', () => {
    expect(defaultOutputFormat(true)).toBe(OutputFormat.Debug);
    expect(defaultOutputFormat(false)).toBe(OutputFormat.JsonLines);
  });

  it('treats an empty file list as standard input', () => {
    expect(isStdinSource({ files: [], format: InputFormat.Lines })).toBe(true);
    expect(isStdinSource({ files: ['data.txt'], format: InputFormat.Lines })).toBe(false);
  });
});
