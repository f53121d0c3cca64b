/**
 * A recognized compiler failure and what the user can do about it.
 */
export interface ErrorSuggestion {
  problem: string;
  fixes: string[];
}

interface SuggestionRule {
  id: string;
  matches: (stderr: string, expression: string | undefined) => boolean;
  suggest: (stderr: string, expression: string | undefined) => ErrorSuggestion;
}

// Format parsers users sometimes call as methods instead of passing the flag
const PARSE_METHOD_FLAGS: ReadonlyArray<{ method: string; flag: string }> = [
  { method: 'parse_csv', flag: '--parse-csv' },
  { method: 'parse_tsv', flag: '--parse-tsv' },
  { method: 'parse_json', flag: '--parse-json' },
];

function misusedParseMethod(expression: string | undefined): { method: string; flag: string } | undefined {
  if (!expression) return undefined;
  return PARSE_METHOD_FLAGS.find(({ method }) => expression.includes(`.${method}`));
}

// Ordered: the first matching rule wins
const RULES: readonly SuggestionRule[] = [
  {
    id: 'string-number-comparison',
    matches: (stderr) =>
      (stderr.includes('mismatched types') || stderr.includes('PartialOrd')) &&
      stderr.includes('String') &&
      stderr.includes('integer'),
    suggest: () => ({
      problem: 'Cannot compare string with number',
      fixes: [
        'Parse to number first: x.parse::<i32>().unwrap()',
        'Compare string lengths instead: x.len() > 5',
        'Compare as strings: x > "5"',
      ],
    }),
  },
  {
    id: 'unknown-function',
    matches: (stderr) => stderr.includes('cannot find function'),
    suggest: (_stderr, expression) => {
      const misused = misusedParseMethod(expression);
      if (misused) {
        return {
          problem: `${misused.method}() is not a method`,
          fixes: [`Use ${misused.flag} flag: rpipe ${misused.flag} '_.filter(...)'`],
        };
      }
      return {
        problem: 'Unknown function or method',
        fixes: [
          'Check available operations: filter, map, take, skip, count, sum',
          'Run rpipe without arguments to see examples',
        ],
      };
    },
  },
  {
    id: 'closure-type-mismatch',
    matches: (stderr) => stderr.includes('mismatched types') && stderr.includes('closure'),
    suggest: () => ({
      problem: 'Type mismatch in closure',
      fixes: [
        'Check your closure parameter types',
        'Use explicit types: |x: &Type| if inference fails',
      ],
    }),
  },
  {
    id: 'string-index',
    matches: (stderr) => stderr.includes('cannot index') && stderr.includes('with `&str`'),
    suggest: () => ({
      problem: 'Cannot index string with string',
      fixes: [
        'For CSV: use --parse-csv flag to parse files',
        'Access columns with: row["column_name"]',
      ],
    }),
  },
  {
    id: 'unwrap-option',
    matches: (stderr) => stderr.includes('Option<') && stderr.includes('expected'),
    suggest: () => ({
      problem: 'Operation returns Option - need to unwrap',
      fixes: ['Extract value: value.unwrap()', 'With fallback: value.unwrap_or(default)'],
    }),
  },
  {
    id: 'not-an-iterator',
    matches: (stderr) =>
      stderr.includes('not an iterator') ||
      (stderr.includes("doesn't implement") && stderr.includes('Iterator')),
    suggest: () => ({
      problem: 'Value is not an iterator',
      fixes: [
        'Create iterator: value.iter()',
        'Check if result is terminal (count, sum return values, not iterators)',
      ],
    }),
  },
];

/**
 * Match compiler stderr against the known failure patterns.
 * Returns undefined when nothing is recognized.
 */
export function getSuggestion(stderr: string, expression?: string): ErrorSuggestion | undefined {
  const rule = RULES.find((r) => r.matches(stderr, expression));
  return rule?.suggest(stderr, expression);
}
