// Base error class for all rpipe errors
export class RpipeError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'RpipeError';
  }
}

// Filesystem or process spawning failure
export class IoError extends RpipeError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message, 'IO_ERROR');
    this.name = 'IoError';
  }
}

// Cache root could not be resolved or prepared
export class CacheError extends RpipeError {
  constructor(message: string) {
    super(message, 'CACHE_ERROR');
    this.name = 'CacheError';
  }
}

// No usable compiler via the embedded archive or the system PATH
export class ToolchainError extends RpipeError {
  constructor(message: string) {
    super(message, 'TOOLCHAIN_ERROR');
    this.name = 'ToolchainError';
  }
}

/**
 * Compiler exited non-zero. The message is the translated, display-ready
 * diagnostic report and is printed as-is.
 */
export class CompilationError extends RpipeError {
  constructor(message: string) {
    super(message, 'COMPILATION_ERROR');
    this.name = 'CompilationError';
  }
}

export class InvalidExpressionError extends RpipeError {
  constructor(message: string) {
    super(message, 'INVALID_EXPRESSION');
    this.name = 'InvalidExpressionError';
  }
}

// The compiled program itself exited non-zero
export class ExecutionError extends RpipeError {
  constructor(
    message: string,
    public readonly status: number,
    public readonly signal?: string
  ) {
    super(message, 'EXECUTION_ERROR');
    this.name = 'ExecutionError';
  }
}

// Validation error for CLI options and environment variables
export class ValidationError extends RpipeError {
  constructor(message: string) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
  }
}

// Utility function to handle unknown errors safely
export function handleUnknownError(e: unknown, context: string): Error {
  if (e instanceof Error) {
    return e;
  }
  return new Error(`${context}: ${String(e)}`);
}

/**
 * Wraps a thrown filesystem error into an IoError, keeping typed rpipe errors intact.
 */
export function toIoError(e: unknown, context: string): RpipeError {
  if (e instanceof RpipeError) {
    return e;
  }
  const err = handleUnknownError(e, context);
  return new IoError(`${context}: ${err.message}`, e);
}
