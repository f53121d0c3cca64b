import { Option, type Command } from 'commander';
import { existsSync, realpathSync } from 'fs';
import * as path from 'path';
import { CacheStore } from '../cache/cache-store';
import {
  defaultOutputFormat,
  OUTPUT_FORMAT_NAMES,
  parseOutputFormat,
  type InputSource,
  type OutputFormat,
} from '../codegen/formats';
import { synthesize } from '../codegen/synthesizer';
import { candidateRoots } from '../compiler/artifact-locator';
import { loadConfig } from '../boundaries/config-loader';
import { inputFormatFromOptions, parseCliOptions } from '../boundaries/cli-parser';
import { parseEnvironment } from '../boundaries/env-parser';
import {
  CompilationError,
  ExecutionError,
  InvalidExpressionError,
  IoError,
  handleUnknownError,
} from '../errors/index';
import { debug, error, isVerboseMode, setVerboseMode } from '../output/logger';
import { printCacheStats, printStats } from '../output/reporter';
import { printWelcome } from '../output/welcome';
import { ProcessRunner, type CommandRunner } from '../process/command-runner';
import { EmbeddedToolchain } from '../toolchain/embedded-toolchain';
import { readCompilerVersion } from '../toolchain/system-toolchain';
import { resolveToolchain } from '../toolchain/toolchain-resolver';
import type { ToolchainHandle } from '../toolchain/types';
import { runPipeline } from './orchestrator';

/**
 * Process-level facts the command needs, gathered once so the command itself
 * reads no global state.
 */
export interface CliContext {
  env: NodeJS.ProcessEnv;
  cwd: string;
  stdinIsTTY: boolean;
  stdoutIsTTY: boolean;
  executableDir?: string | undefined;
  runner: CommandRunner;
}

function currentExecutableDir(): string | undefined {
  const script = process.argv[1];
  if (!script) return undefined;
  try {
    return path.dirname(realpathSync(script));
  } catch {
    return path.dirname(path.resolve(script));
  }
}

export function defaultContext(): CliContext {
  return {
    env: process.env,
    cwd: process.cwd(),
    stdinIsTTY: process.stdin.isTTY === true,
    stdoutIsTTY: process.stdout.isTTY === true,
    executableDir: currentExecutableDir(),
    runner: new ProcessRunner(),
  };
}

/*
 * Prints an error the way the CLI reports it and returns the exit code.
 * Compilation reports are already formatted and are printed verbatim.
 */
export function reportError(e: unknown): number {
  if (e instanceof CompilationError) {
    error(e.message);
    return 1;
  }
  if (e instanceof ExecutionError) {
    error(`Error: ${e.message}`);
    return e.status;
  }
  const err = handleUnknownError(e, 'Running rpipe');
  error(`Error: ${err.message}`);
  return 1;
}

function validateFiles(files: string[], cwd: string): void {
  for (const file of files) {
    if (!existsSync(path.resolve(cwd, file))) {
      throw new IoError(`File not found: ${file}`);
    }
  }
}

function resolveOutputFormat(name: string | undefined, stdoutIsTTY: boolean): OutputFormat {
  if (name === undefined) {
    return defaultOutputFormat(stdoutIsTTY);
  }
  const format = parseOutputFormat(name);
  if (!format) {
    throw new InvalidExpressionError(`Unknown output format: ${name}`);
  }
  return format;
}

/**
 * Runs one invocation and returns the process exit code. Errors are printed
 * here and never escape.
 */
export async function runCli(
  expression: string | undefined,
  files: string[],
  rawOptions: unknown,
  context: CliContext
): Promise<number> {
  try {
    const options = parseCliOptions(rawOptions);
    setVerboseMode(options.verbose);

    const config = loadConfig(parseEnvironment(context.env));

    if (options.clearCache) {
      new CacheStore(config.cacheRoot).clear();
      console.log('Cache cleared successfully');
      return 0;
    }

    if (options.cacheStats) {
      const cache = new CacheStore(config.cacheRoot);
      printCacheStats(cache.stats(), cache.root);
      return 0;
    }

    if (expression === undefined || expression.trim() === '') {
      if (files.length === 0 && context.stdinIsTTY) {
        printWelcome();
        return 0;
      }
      throw new InvalidExpressionError('No expression provided. Use --help for usage.');
    }

    validateFiles(files, context.cwd);
    const input: InputSource = { files, format: inputFormatFromOptions(options) };
    const outputFormat = resolveOutputFormat(options.format, context.stdoutIsTTY);

    if (options.showSource) {
      process.stdout.write(synthesize(expression, input, outputFormat));
      return 0;
    }

    const embedded = new EmbeddedToolchain({
      toolchainDir: config.toolchainDir,
      archivePath: config.toolchainArchive,
    });
    const resolve = async (): Promise<ToolchainHandle> => {
      const handle = await resolveToolchain({
        embedded,
        systemCompiler: config.systemCompiler,
        runner: context.runner,
      });
      if (isVerboseMode()) {
        const version = await readCompilerVersion(handle.compilerPath, context.runner);
        if (version) debug(`Compiler version: ${version}`);
      }
      return handle;
    };

    const report = await runPipeline(
      { expression, input, outputFormat },
      {
        cache: new CacheStore(config.cacheRoot),
        resolveToolchain: resolve,
        runner: context.runner,
        artifactRoots: () =>
          candidateRoots({
            manifestDir: config.manifestDir,
            executableDir: context.executableDir,
            cwd: context.cwd,
          }),
      }
    );

    if (options.stats) {
      printStats(report);
    }
    return 0;
  } catch (e: unknown) {
    return reportError(e);
  }
}

/*
 * Registers the pipeline command with Commander.
 * The expression is optional so cache management flags work on their own.
 */
export function registerMainCommand(program: Command, context: () => CliContext = defaultContext): void {
  program
    .addOption(new Option('--parse-csv', 'Parse input as CSV with headers').conflicts(['parseTsv', 'parseJson']))
    .addOption(new Option('--parse-tsv', 'Parse input as TSV with headers').conflicts(['parseCsv', 'parseJson']))
    .addOption(new Option('--parse-json', 'Parse each input line as JSON').conflicts(['parseCsv', 'parseTsv']))
    .addOption(
      new Option('-f, --format <format>', 'Output format (default: debug on a terminal, jsonl otherwise)').choices(
        OUTPUT_FORMAT_NAMES
      )
    )
    .option('-s, --show-source', 'Print the generated source without compiling it')
    .option('--clear-cache', 'Remove every cached source and binary')
    .option('--cache-stats', 'Show cache statistics')
    .option('-v, --verbose', 'Enable verbose logging')
    .option('--stats', 'Print compile and execution timing')
    .argument('[expression]', 'iterator expression, with _ standing for the input')
    .argument('[files...]', 'input files (standard input when omitted)')
    .action(async (expression: string | undefined, files: string[] = []) => {
      const code = await runCli(expression, files, program.opts(), context());
      process.exit(code);
    });
}
