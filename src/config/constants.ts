/**
 * Configuration constants
 */

export const APP_NAME = 'rpipe';

export const SOURCES_DIRNAME = 'sources';
export const BINARIES_DIRNAME = 'binaries';
export const TOOLCHAIN_DIRNAME = 'toolchain';
export const SOURCE_EXTENSION = '.rs';

export const DEFAULT_SYSTEM_COMPILER = 'rustc';
export const TOOLCHAIN_ARCHIVE_FILENAME = 'toolchain.tar.gz';

// Compiler location inside an extracted toolchain
export const TOOLCHAIN_COMPILER_PATH = ['bin', 'rustc'] as const;

export const RUST_EDITION = '2021';

// Crates the generated programs link against
export const PRELUDE_CRATE = 'rpipe_prelude';
export const CORE_CRATE = 'rpipe_core';

// Local the input sequence is bound to inside the generated program
export const INPUT_BINDING = 'input_data';
export const INPUT_MARKER = '_';

/*
 * Method calls that already reduce a sequence to a single value.
 * Matched as raw substrings of the expression, so a closure body that merely
 * mentions one of them also counts as terminal.
 */
export const TERMINAL_OPERATIONS = [
  '.collect(',
  '.count()',
  '.sum(',
  '.sum::',
  '.min()',
  '.max()',
  '.reduce(',
  '.fold(',
  '.fold_left(',
  '.first()',
  '.last()',
  '.to_list()',
  '.any(',
  '.all(',
] as const;
