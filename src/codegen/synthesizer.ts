import {
  INPUT_BINDING,
  INPUT_MARKER,
  PRELUDE_CRATE,
  TERMINAL_OPERATIONS,
} from '../config/constants';
import { InputFormat, OutputFormat, isStdinSource, type InputSource } from './formats';

/**
 * Whether the expression already reduces to a single value or still yields a sequence.
 */
export type ResultKind = 'terminal' | 'lazy';

interface AcquisitionForms {
  stdin: string;
  files: string;
}

const INDENT = '    ';

// {stdin, files} x input format -> prelude call that produces the input sequence
const ACQUISITION: Record<InputFormat, AcquisitionForms> = {
  [InputFormat.Lines]: { stdin: 'input()', files: 'input_from_files(&files)' },
  [InputFormat.Csv]: { stdin: 'input_csv()', files: 'input_csv_from_files(&files)' },
  [InputFormat.Tsv]: { stdin: 'input_tsv()', files: 'input_tsv_from_files(&files)' },
  [InputFormat.JsonLines]: { stdin: 'input_json()', files: 'input_json_from_files(&files)' },
};

const FILES_BINDING =
  'let files: Vec<std::path::PathBuf> = std::env::args().skip(1).map(std::path::PathBuf::from).collect();';

const SERDE_IMPORT = `use ${PRELUDE_CRATE}::serde_json;`;

const EXTRA_IMPORTS: Record<OutputFormat, string[]> = {
  [OutputFormat.Debug]: [],
  [OutputFormat.Json]: [SERDE_IMPORT],
  [OutputFormat.JsonLines]: [SERDE_IMPORT],
  [OutputFormat.Csv]: [SERDE_IMPORT, `use ${PRELUDE_CRATE}::csv;`],
  [OutputFormat.Table]: [SERDE_IMPORT, `use ${PRELUDE_CRATE}::tabled::builder::Builder;`],
};

// Renders one JSON value as a CSV/table cell: strings unquoted, null and missing empty
const CELL_TEXT_HELPER = [
  'fn cell_text(value: Option<&serde_json::Value>) -> String {',
  '    match value {',
  '        Some(serde_json::Value::String(text)) => text.clone(),',
  '        Some(serde_json::Value::Null) | None => String::new(),',
  '        Some(other) => other.to_string(),',
  '    }',
  '}',
];

const MATERIALIZE: Record<ResultKind, string> = {
  lazy: 'let rows: Vec<_> = result.collect();',
  // Row-oriented writers need a collection even for a single value
  terminal: 'let rows = vec![result];',
};

/*
 * Header is the sorted key set of the first record when it is an object;
 * otherwise every record becomes a single cell.
 */
const RECORDS = [
  'let records: Vec<serde_json::Value> = rows',
  '    .iter()',
  '    .map(|row| serde_json::to_value(row).unwrap())',
  '    .collect();',
  'let headers: Vec<String> = match records.first() {',
  '    Some(serde_json::Value::Object(first)) => {',
  '        let mut keys: Vec<String> = first.keys().cloned().collect();',
  '        keys.sort();',
  '        keys',
  '    }',
  '    _ => Vec::new(),',
  '};',
  'let cells = |record: &serde_json::Value| -> Vec<String> {',
  '    if headers.is_empty() {',
  '        vec![cell_text(Some(record))]',
  '    } else {',
  '        headers.iter().map(|key| cell_text(record.get(key))).collect()',
  '    }',
  '};',
];

const CSV_WRITER = [
  'if !records.is_empty() {',
  '    let mut writer = csv::Writer::from_writer(std::io::stdout());',
  '    if !headers.is_empty() {',
  '        writer.write_record(&headers).unwrap();',
  '    }',
  '    for record in &records {',
  '        writer.write_record(cells(record)).unwrap();',
  '    }',
  '    writer.flush().unwrap();',
  '}',
];

const TABLE_BUILDER = [
  'if !records.is_empty() {',
  '    let mut builder = Builder::default();',
  '    if !headers.is_empty() {',
  '        builder.push_record(headers.clone());',
  '    }',
  '    for record in &records {',
  '        builder.push_record(cells(record));',
  '    }',
  '    println!("{}", builder.build());',
  '}',
];

const OUTPUT_STAGES: Record<OutputFormat, Record<ResultKind, string[]>> = {
  [OutputFormat.Debug]: {
    lazy: ['for item in result {', '    println!("{:?}", item);', '}'],
    terminal: ['println!("{:?}", result);'],
  },
  [OutputFormat.JsonLines]: {
    lazy: ['for item in result {', '    println!("{}", serde_json::to_string(&item).unwrap());', '}'],
    terminal: ['println!("{}", serde_json::to_string(&result).unwrap());'],
  },
  [OutputFormat.Json]: {
    lazy: ['let items: Vec<_> = result.collect();', 'println!("{}", serde_json::to_string_pretty(&items).unwrap());'],
    terminal: ['println!("{}", serde_json::to_string_pretty(&result).unwrap());'],
  },
  [OutputFormat.Csv]: {
    lazy: [MATERIALIZE.lazy, ...RECORDS, ...CSV_WRITER],
    terminal: [MATERIALIZE.terminal, ...RECORDS, ...CSV_WRITER],
  },
  [OutputFormat.Table]: {
    lazy: [MATERIALIZE.lazy, ...RECORDS, ...TABLE_BUILDER],
    terminal: [MATERIALIZE.terminal, ...RECORDS, ...TABLE_BUILDER],
  },
};

/**
 * An expression consumes the input sequence when it starts with the `_` marker.
 */
export function usesInput(expression: string): boolean {
  return expression.trim().startsWith(INPUT_MARKER);
}

/**
 * Lexical check against a fixed keyword list. Heuristic: it does not parse the
 * expression, so `_.map(|g| g.count())` is classified as terminal too.
 */
export function isTerminalExpression(expression: string): boolean {
  return TERMINAL_OPERATIONS.some((op) => expression.includes(op));
}

export function classifyExpression(expression: string): ResultKind {
  return isTerminalExpression(expression) ? 'terminal' : 'lazy';
}

export function acquisitionCall(format: InputFormat, fromFiles: boolean): string {
  const forms = ACQUISITION[format];
  return fromFiles ? forms.files : forms.stdin;
}

function needsCellHelper(format: OutputFormat): boolean {
  return format === OutputFormat.Csv || format === OutputFormat.Table;
}

/**
 * Render the complete program for an expression.
 *
 * Deterministic: identical arguments give byte-identical text, which is what the
 * binary cache keys on. Input file paths are not embedded; the compiled program
 * receives them as arguments, so only the source kind (stdin or files) matters.
 */
export function synthesize(expression: string, input: InputSource, outputFormat: OutputFormat): string {
  const lines: string[] = [`use ${PRELUDE_CRATE}::*;`, ...EXTRA_IMPORTS[outputFormat], ''];

  if (needsCellHelper(outputFormat)) {
    lines.push(...CELL_TEXT_HELPER, '');
  }

  const body: string[] = [];
  let rendered = expression;
  if (usesInput(expression)) {
    const fromFiles = !isStdinSource(input);
    if (fromFiles) {
      body.push(FILES_BINDING);
    }
    body.push(`let ${INPUT_BINDING} = ${acquisitionCall(input.format, fromFiles)};`);
    // String.replace with a string pattern swaps the first occurrence only
    rendered = expression.replace(INPUT_MARKER, INPUT_BINDING);
  }

  body.push(`let result = ${rendered};`);
  body.push(...OUTPUT_STAGES[outputFormat][classifyExpression(expression)]);

  lines.push('fn main() {', ...body.map((line) => INDENT + line), '}');
  return lines.join('\n') + '\n';
}
