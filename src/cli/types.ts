import type { CompileResult } from '../cache/types';
import type { InputSource, OutputFormat } from '../codegen/formats';

export interface PipelineRequest {
  expression: string;
  input: InputSource;
  outputFormat: OutputFormat;
}

export interface PipelineReport {
  compileResult: CompileResult;
  compileMs: number;
  executeMs: number;
  totalMs: number;
}
