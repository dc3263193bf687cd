/**
 * Line Reader Tests
 *
 * Record splitting, end-of-stream handling, read failures and the
 * maximum record length.
 */

import { Readable } from 'node:stream';
import { describe, it, expect } from 'vitest';
import { InputReadError, RecordTooLongError } from '../../../core/errors.js';
import { readLines, type InputLine } from '../../../io/line-reader.js';
import { failingInput } from '../../utils/doubles.js';

async function collect(
  input: AsyncIterable<Buffer | string>,
  maxRecordLength = 256
): Promise<InputLine[]> {
  const lines: InputLine[] = [];
  for await (const line of readLines(input, { maxRecordLength })) {
    lines.push(line);
  }
  return lines;
}

describe('readLines', () => {
  it('yields one record per line with 1-based line numbers', async () => {
    const lines = await collect(Readable.from(['8928308280fffff\n8928308283fffff\n']));

    expect(lines).toEqual([
      { text: '8928308280fffff', line: 1 },
      { text: '8928308283fffff', line: 2 },
    ]);
  });

  it('joins records split across chunks', async () => {
    const lines = await collect(Readable.from(['89283', '08280fffff\n892', '8308283fffff\n']));

    expect(lines.map((l) => l.text)).toEqual(['8928308280fffff', '8928308283fffff']);
  });

  it('strips a carriage return before the newline', async () => {
    const lines = await collect(Readable.from(['abc\r\n', 'def\r', '\n']));

    expect(lines.map((l) => l.text)).toEqual(['abc', 'def']);
  });

  it('yields a final line that has no terminator', async () => {
    const lines = await collect(Readable.from(['abc\ndef']));

    expect(lines.map((l) => l.text)).toEqual(['abc', 'def']);
  });

  it('keeps blank lines as empty records', async () => {
    const lines = await collect(Readable.from(['a\n\nb\n']));

    expect(lines).toEqual([
      { text: 'a', line: 1 },
      { text: '', line: 2 },
      { text: 'b', line: 3 },
    ]);
  });

  it('yields nothing for an empty stream', async () => {
    expect(await collect(Readable.from([]))).toEqual([]);
  });

  it('decodes multi-byte characters split across buffer chunks', async () => {
    const bytes = Buffer.from('né\n', 'utf8');
    const lines = await collect(Readable.from([bytes.subarray(0, 2), bytes.subarray(2)]));

    expect(lines.map((l) => l.text)).toEqual(['né']);
  });

  describe('read failures', () => {
    it('wraps a stream error in InputReadError after the lines already read', async () => {
      const failure = new Error('EIO: i/o error, read');
      const seen: string[] = [];

      const run = async (): Promise<void> => {
        for await (const { text } of readLines(failingInput(['abc\n'], failure), {
          maxRecordLength: 256,
        })) {
          seen.push(text);
        }
      };

      const error = await run().then(
        () => null,
        (e: unknown) => e
      );

      expect(seen).toEqual(['abc']);
      expect(error).toBeInstanceOf(InputReadError);
      expect(error).toMatchObject({
        message: 'reading H3 index from input: EIO: i/o error, read',
        cause: failure,
        exitCode: 4,
      });
    });

    it('reports an errored Readable as InputReadError', async () => {
      const stream = new Readable({
        read() {
          this.destroy(new Error('boom'));
        },
      });

      await expect(collect(stream)).rejects.toBeInstanceOf(InputReadError);
    });
  });

  describe('maximum record length', () => {
    it('accepts a line of exactly the maximum length', async () => {
      const lines = await collect(Readable.from(['abcde\r\n']), 5);

      expect(lines.map((l) => l.text)).toEqual(['abcde']);
    });

    it('rejects a terminated line over the limit with its line number', async () => {
      await expect(collect(Readable.from(['abc\nabcdefgh\n']), 5)).rejects.toMatchObject({
        name: 'RecordTooLongError',
        line: 2,
        maxRecordLength: 5,
        message: 'record on line 2 exceeds 5 characters',
      });
    });

    it('rejects an unterminated oversized record before reading further', async () => {
      const failure = new Error('should not be read');

      const error = await collect(failingInput(['abcdefgh'], failure), 5).then(
        () => null,
        (e: unknown) => e
      );

      expect(error).toBeInstanceOf(RecordTooLongError);
      expect(error).toMatchObject({ line: 1 });
    });
  });
});
