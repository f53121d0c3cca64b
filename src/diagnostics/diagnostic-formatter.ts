import chalk from 'chalk';
import { getSuggestion, type ErrorSuggestion } from './suggestion-engine';

export type DiagnosticLineKind =
  | 'error'
  | 'warning'
  | 'location'
  | 'source'
  | 'annotation'
  | 'caret'
  | 'help'
  | 'note'
  | 'summary'
  | 'blank'
  | 'other';

const HEADER = '✗ Compilation Error';
const TIP = 'Tip: Check your expression syntax and ensure all parentheses match';

const SOURCE_LINE = /^\s*\d+\s*\|/;
const CARET_ONLY = /^[\s|^-]*\^[\s|^-]*$/;
const LOCATION = /-->\s*(.+?)(:\d+(?::\d+)?)?\s*$/;

/**
 * Presentation category of one line of compiler stderr. Order matters: abort
 * summaries also start with "error:".
 */
export function classifyLine(line: string): DiagnosticLineKind {
  const trimmed = line.trimStart();

  if (line.startsWith('error: aborting') || line.startsWith('error: could not compile')) return 'summary';
  if (line.startsWith('error:') || line.startsWith('error[')) return 'error';
  if (line.startsWith('warning:') || line.startsWith('warning[')) return 'warning';
  if (trimmed.startsWith('-->')) return 'location';
  if (SOURCE_LINE.test(line)) return 'source';
  if (CARET_ONLY.test(line) || trimmed.startsWith('^')) return 'caret';
  if (trimmed.startsWith('|')) return trimmed.includes('^') ? 'caret' : 'annotation';
  if (trimmed.startsWith('= help:') || trimmed.startsWith('help:')) return 'help';
  if (trimmed.startsWith('= note:') || trimmed.startsWith('note:')) return 'note';
  if (trimmed.length === 0) return 'blank';
  return 'other';
}

/**
 * Reduce a `--> /long/cache/path/sources/abc.rs:3:17` line to `--> abc.rs:3:17`.
 * Returns undefined when the line has no recognizable location.
 */
export function simplifyLocation(line: string): string | undefined {
  const match = LOCATION.exec(line);
  if (!match || !match[1]) return undefined;
  const fileName = match[1].split(/[\\/]/).pop() || match[1];
  return `--> ${fileName}${match[2] ?? ''}`;
}

function renderLine(line: string): string[] {
  switch (classifyLine(line)) {
    case 'error':
      return [`  ${chalk.red.bold(line)}`];
    case 'warning':
      return [`  ${chalk.yellow.bold(line)}`];
    case 'location':
      return [`  ${chalk.cyan(simplifyLocation(line) ?? line)}`];
    case 'source':
      return [`  ${line}`];
    case 'annotation':
      return [`  ${chalk.cyan(line)}`];
    case 'caret':
      return [`  ${chalk.red.bold(line)}`];
    case 'help':
      return [`  ${chalk.blue(line)}`];
    case 'note':
      return [`  ${chalk.cyan(line)}`];
    case 'summary':
      return ['', `  ${chalk.red(line)}`];
    case 'blank':
      return [''];
    case 'other':
      return [`  ${line}`];
  }
}

function renderSuggestion(suggestion: ErrorSuggestion): string[] {
  return [
    `  ${chalk.yellow.bold('Problem:')} ${suggestion.problem}`,
    '',
    `  ${chalk.green.bold('How to fix:')}`,
    ...suggestion.fixes.map((fix) => `    • ${fix}`),
    '',
  ];
}

/**
 * Turn raw compiler stderr into the report shown to the user: header, the
 * expression, a suggestion when a known pattern matches, every diagnostic line
 * re-colored by category, and a closing tip.
 */
export function formatCompilationError(stderr: string, expression?: string): string {
  const output: string[] = [chalk.red.bold(HEADER), ''];

  if (expression !== undefined) {
    output.push(`  ${chalk.cyan.bold('Your expression:')} ${chalk.yellow(expression)}`, '');
  }

  const suggestion = getSuggestion(stderr, expression);
  if (suggestion) {
    output.push(...renderSuggestion(suggestion));
  }

  // rustc ends its output with a newline; it does not start another line
  for (const line of stderr.replace(/\r?\n$/, '').split(/\r?\n/)) {
    output.push(...renderLine(line));
  }

  output.push('', chalk.blue(TIP));
  return output.join('\n');
}
