import { MalformedInputError } from '../utils/errors.js';

export type StreamItem<T> =
  | { kind: 'some'; value: T }
  | { kind: 'none' }
  | { kind: 'end' };

/**
 * Pull-style supply of raw log records. Each call hands over the next item;
 * `none` is a nil record and `end` means the stream is exhausted.
 */
export interface LogSource {
  next(): StreamItem<unknown>;
}

/**
 * Creates a source over NDJSON text. Blank lines are skipped and a `null`
 * line is a nil record.
 * A line that is not JSON makes that call to next() throw a
 * MalformedInputError; the following call moves on to the next line.
 */
export function createLineSource(text: string): LogSource {
  const lines = text
    .split(/\r?\n/)
    .map((line, index) => ({ line: line.trim(), number: index + 1 }))
    .filter(({ line }) => line.length > 0);
  let position = 0;

  return {
    next(): StreamItem<unknown> {
      if (position >= lines.length) {
        return { kind: 'end' };
      }

      const { line, number } = lines[position++];
      let value: unknown;
      try {
        value = JSON.parse(line);
      } catch (error) {
        throw new MalformedInputError(
          `Line ${number} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
        );
      }

      return value === null ? { kind: 'none' } : { kind: 'some', value };
    },
  };
}

/**
 * Creates a source over records already in memory
 */
export function createArraySource(records: readonly unknown[]): LogSource {
  let position = 0;

  return {
    next(): StreamItem<unknown> {
      if (position >= records.length) {
        return { kind: 'end' };
      }
      const value = records[position++];
      return value === null || value === undefined ? { kind: 'none' } : { kind: 'some', value };
    },
  };
}
