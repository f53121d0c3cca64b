import chalk from 'chalk';

interface Example {
  comment: string;
  command: string;
  output?: string;
}

const EXAMPLES: readonly Example[] = [
  {
    comment: 'Filter even numbers',
    command: "seq 1 100 | rpipe '_.filter(|x| x.parse::<i32>().unwrap() % 2 == 0).count()'",
    output: 'Output: 50',
  },
  {
    comment: 'Process file directly',
    command: "rpipe '_.filter(|x| x.len() > 5).take(10)' data.txt",
    output: 'Output: First 10 lines longer than 5 chars',
  },
  {
    comment: 'Parse CSV data',
    command: `rpipe --parse-csv '_.filter(|r| r["age"].parse::<i32>().unwrap() > 18)' users.csv`,
    output: 'Output: Rows where age > 18',
  },
  {
    comment: 'Multiple files',
    command: "rpipe '_.unique().count()' file1.txt file2.txt",
  },
];

const OPERATIONS: ReadonlyArray<[string, string]> = [
  ['Selection:', 'filter, take, skip, unique, drop_while'],
  ['Transform:', 'map, enumerate, zip, flatten'],
  ['Grouping:', 'chunk, window, group_by'],
  ['Terminal:', 'count, sum, min, max, to_list'],
];

const INPUT_FORMATS: ReadonlyArray<[string, string]> = [
  ['--parse-csv', 'Parse input as CSV with headers'],
  ['--parse-tsv', 'Parse input as TSV with headers'],
  ['--parse-json', 'Parse each line as JSON'],
];

const OUTPUT_FORMATS: ReadonlyArray<[string, string]> = [
  ['--format debug', 'Debug format (default on a terminal)'],
  ['--format json', 'JSON array'],
  ['--format jsonl', 'JSON lines, one per line (default when piped)'],
  ['--format csv', 'CSV output (requires CSV input)'],
  ['--format table', 'Table output (requires CSV/JSON input)'],
];

const LEARN_MORE: ReadonlyArray<[string, string]> = [
  ['rpipe --help', 'Full documentation'],
  ['rpipe --show-source EXPR', 'See generated Rust code'],
  ['rpipe --cache-stats', 'View compilation cache'],
];

function twoColumns(rows: ReadonlyArray<[string, string]>, width: number): string[] {
  return rows.map(([left, right]) => `    ${left.padEnd(width)}${right}`);
}

export function welcomeLines(): string[] {
  const lines: string[] = [chalk.bold.cyan('rpipe - compiled Rust pipelines for the shell'), ''];

  lines.push(chalk.bold('USAGE:'));
  lines.push('    rpipe [OPTIONS] <EXPRESSION> [FILE...]');
  lines.push('    command | rpipe [OPTIONS] <EXPRESSION>', '');

  lines.push(chalk.bold('EXAMPLES:'));
  for (const example of EXAMPLES) {
    lines.push(`    ${chalk.dim(`# ${example.comment}`)}`);
    lines.push(`    ${example.command}`);
    if (example.output) {
      lines.push(`    ${chalk.dim(`# ${example.output}`)}`);
    }
    lines.push('');
  }

  lines.push(chalk.bold('COMMON OPERATIONS:'));
  for (const [label, ops] of OPERATIONS) {
    lines.push(`    ${chalk.cyan(label.padEnd(12))}${ops}`);
  }
  lines.push('');

  lines.push(chalk.bold('INPUT FORMATS:'), ...twoColumns(INPUT_FORMATS, 20), '');
  lines.push(chalk.bold('OUTPUT FORMATS:'), ...twoColumns(OUTPUT_FORMATS, 20), '');
  lines.push(chalk.bold('LEARN MORE:'), ...twoColumns(LEARN_MORE, 28));

  return lines;
}

export function printWelcome() {
  console.log(welcomeLines().join('\n'));
}
