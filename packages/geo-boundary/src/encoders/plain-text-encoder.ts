/**
 * Plain Text Encoder
 *
 * Label line followed by one `lat lng` line per vertex. Meant for reading,
 * not re-parsing: the vertex count is not written.
 *
 * @module encoders/plain-text-encoder
 */

import { TEXT_COORDINATE_PRECISION } from '../core/constants.js';
import type { Boundary } from '../core/types.js';
import type { OutputSink } from '../io/output-sink.js';
import type { OutputEncoder } from './types.js';

export class PlainTextEncoder implements OutputEncoder {
  constructor(private readonly sink: OutputSink) {}

  /** Plain text has no framing to close */
  get isOpen(): boolean {
    return false;
  }

  async writeHeader(): Promise<void> {}

  async writeRecord(label: string, boundary: Boundary): Promise<void> {
    const lines = [label];
    for (const [lat, lng] of boundary) {
      lines.push(
        `${lat.toFixed(TEXT_COORDINATE_PRECISION)} ${lng.toFixed(TEXT_COORDINATE_PRECISION)}`
      );
    }
    await this.sink.write(`${lines.join('\n')}\n`);
  }

  async writeFooter(): Promise<void> {}
}
