import { describe, it, expect } from 'vitest';
import { getSuggestion } from '../src/diagnostics/suggestion-engine';

describe('Suggestion Engine', () => {
  it('explains string and number comparisons', () => {
    const stderr = 'error[E0308]: mismatched types\n expected `&String`, found integer';

    expect(getSuggestion(stderr)).toEqual({
      problem: 'Cannot compare string with number',
      fixes: [
        'Parse to number first: x.parse::<i32>().unwrap()',
        'Compare string lengths instead: x.len() > 5',
        'Compare as strings: x > "5"',
      ],
    });
  });

  it('matches the comparison rule through PartialOrd too', () => {
    const stderr = "error[E0277]: can't compare `String` with `{integer}`\n the trait `PartialOrd<{integer}>` is not implemented";

    expect(getSuggestion(stderr)?.problem).toBe('Cannot compare string with number');
  });

  it('points misused parse methods at the matching flag', () => {
    const stderr = 'error[E0425]: cannot find function `parse_tsv` in this scope';

    expect(getSuggestion(stderr, '_.parse_tsv().take(2)')).toEqual({
      problem: 'parse_tsv() is not a method',
      fixes: ["Use --parse-tsv flag: rpipe --parse-tsv '_.filter(...)'"],
    });
  });

  it('lists common operations for other unknown functions', () => {
    const stderr = 'error[E0425]: cannot find function `frobnicate` in this scope';

    expect(getSuggestion(stderr, '_.frobnicate()')).toEqual({
      problem: 'Unknown function or method',
      fixes: [
        'Check available operations: filter, map, take, skip, count, sum',
        'Run rpipe without arguments to see examples',
      ],
    });
  });

  it('reports closure type mismatches', () => {
    const stderr = 'error[E0631]: mismatched types\n expected closure signature `fn(&str) -> _`';

    expect(getSuggestion(stderr)?.problem).toBe('Type mismatch in closure');
  });

  it('reports indexing a string with a string', () => {
    const stderr = 'error[E0277]: the type `str` cannot be indexed by `&str`\n cannot index into a value of type `String` with `&str`';

    expect(getSuggestion(stderr)?.problem).toBe('Cannot index string with string');
  });

  it('asks to unwrap Option values', () => {
    const stderr = 'error[E0308]: expected `i32`, found `Option<i32>`';

    expect(getSuggestion(stderr)).toEqual({
      problem: 'Operation returns Option - need to unwrap',
      fixes: ['Extract value: value.unwrap()', 'With fallback: value.unwrap_or(default)'],
    });
  });

  it('reports values used as iterators', () => {
    expect(getSuggestion('error[E0599]: `usize` is not an iterator')?.problem).toBe('Value is not an iterator');
    expect(getSuggestion("error: the type doesn't implement `Iterator`")?.problem).toBe('Value is not an iterator');
  });

  it('prefers earlier rules when several match', () => {
    const stderr = 'mismatched types: closure expected `String`, found integer';

    expect(getSuggestion(stderr)?.problem).toBe('Cannot compare string with number');
  });

  it('returns undefined for unrecognized errors', () => {
    expect(getSuggestion('error: linking with `cc` failed')).toBeUndefined();
    expect(getSuggestion('')).toBeUndefined();
  });
});
