/**
 * Line Reader
 *
 * Splits a byte stream into newline-delimited records. The stream ending
 * is the only normal way out; any stream error becomes InputReadError.
 *
 * @module io/line-reader
 */

import { StringDecoder } from 'node:string_decoder';
import { InputReadError, RecordTooLongError } from '../core/errors.js';

export interface ReadLinesOptions {
  /** Longest accepted line, in characters, excluding the terminator */
  readonly maxRecordLength: number;
}

/**
 * A record together with its 1-based line number
 */
export interface InputLine {
  readonly text: string;
  readonly line: number;
}

/**
 * Yield each line of `input` until end-of-stream
 *
 * A trailing `\r` is removed along with the `\n`. A final line without a
 * terminator is still yielded; an empty stream yields nothing.
 *
 * @throws InputReadError if the stream fails
 * @throws RecordTooLongError as soon as a line grows past the limit
 */
export async function* readLines(
  input: AsyncIterable<Buffer | string>,
  options: ReadLinesOptions
): AsyncGenerator<InputLine, void, undefined> {
  const decoder = new StringDecoder('utf8');
  let pending = '';
  let lineNumber = 0;

  const take = (raw: string): InputLine => {
    lineNumber++;
    const text = raw.endsWith('\r') ? raw.slice(0, -1) : raw;
    if (text.length > options.maxRecordLength) {
      throw new RecordTooLongError(options.maxRecordLength, lineNumber);
    }
    return { text, line: lineNumber };
  };

  const iterator = input[Symbol.asyncIterator]();
  let exhausted = false;
  try {
    while (true) {
      let chunk: IteratorResult<Buffer | string>;
      try {
        chunk = await iterator.next();
      } catch (error) {
        exhausted = true;
        throw new InputReadError(error);
      }
      if (chunk.done) {
        exhausted = true;
        break;
      }

      pending += typeof chunk.value === 'string' ? chunk.value : decoder.write(chunk.value);

      let newline = pending.indexOf('\n');
      while (newline !== -1) {
        yield take(pending.slice(0, newline));
        pending = pending.slice(newline + 1);
        newline = pending.indexOf('\n');
      }

      // +1 leaves room for a '\r' that may precede the next '\n'
      if (pending.length > options.maxRecordLength + 1) {
        throw new RecordTooLongError(options.maxRecordLength, lineNumber + 1);
      }
    }
  } finally {
    if (!exhausted) {
      await iterator.return?.();
    }
  }

  pending += decoder.end();
  if (pending.length > 0) {
    yield take(pending);
  }
}
