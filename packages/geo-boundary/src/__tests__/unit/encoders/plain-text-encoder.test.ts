/**
 * Plain Text Encoder Tests
 *
 * Label and vertex lines, precision and the absence of framing.
 */

import { describe, it, expect } from 'vitest';
import { PlainTextEncoder } from '../../../encoders/plain-text-encoder.js';
import { MemorySink, SQUARE, TRIANGLE } from '../../utils/doubles.js';

describe('PlainTextEncoder', () => {
  it('writes the label and one "lat lng" line per vertex', async () => {
    const sink = new MemorySink();
    const encoder = new PlainTextEncoder(sink);

    await encoder.writeRecord('8928308280fffff', TRIANGLE);

    expect(sink.text).toBe(
      [
        '8928308280fffff',
        '37.500000000 -122.250000000',
        '37.750000000 -122.500000000',
        '37.250000000 -122.125000000',
        '',
      ].join('\n')
    );
  });

  it('does not repeat the first vertex', async () => {
    const sink = new MemorySink();
    await new PlainTextEncoder(sink).writeRecord('abc', SQUARE);

    const lines = sink.text.trimEnd().split('\n');
    expect(lines).toHaveLength(1 + SQUARE.length);
    expect(lines[lines.length - 1]).toBe('11.000000000 20.000000000');
  });

  it('rounds to nine decimal places', async () => {
    const sink = new MemorySink();
    await new PlainTextEncoder(sink).writeRecord('abc', [[1 / 3, -2 / 3]]);

    expect(sink.text).toBe('abc\n0.333333333 -0.666666667\n');
  });

  it('has no header or footer', async () => {
    const sink = new MemorySink();
    const encoder = new PlainTextEncoder(sink);

    await encoder.writeHeader();
    expect(encoder.isOpen).toBe(false);
    await encoder.writeFooter();

    expect(sink.text).toBe('');
  });

  it('appends consecutive records without separators', async () => {
    const sink = new MemorySink();
    const encoder = new PlainTextEncoder(sink);

    await encoder.writeRecord('a', [[1, 2]]);
    await encoder.writeRecord('b', [[3, 4]]);

    expect(sink.text).toBe('a\n1.000000000 2.000000000\nb\n3.000000000 4.000000000\n');
  });
});
