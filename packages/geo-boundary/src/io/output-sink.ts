/**
 * Output Sink
 *
 * Thin wrapper over a Writable that honours back-pressure, so output is
 * interleaved with input consumption instead of piling up in memory.
 * Stream failures surface as OutputWriteError on the next write.
 *
 * @module io/output-sink
 */

import { once } from 'node:events';
import type { Writable } from 'node:stream';
import { OutputWriteError } from '../core/errors.js';

export interface OutputSink {
  write(text: string): Promise<void>;
}

/**
 * Create a sink that waits for `drain` whenever the stream asks it to
 */
export function createOutputSink(stream: Writable): OutputSink {
  let failure: Error | null = null;
  // Keeps an EPIPE from a closed reader from becoming an uncaught 'error'
  stream.on('error', (error: Error) => {
    failure ??= error;
  });

  const ensureWritable = (): void => {
    const error = failure ?? stream.errored;
    if (error) throw new OutputWriteError(error);
    if (stream.destroyed || stream.writableEnded) {
      throw new OutputWriteError(new Error('stream closed'));
    }
  };

  return {
    async write(text: string): Promise<void> {
      if (text.length === 0) return;
      ensureWritable();
      if (!stream.write(text)) {
        await waitForDrain(stream);
      }
    },
  };
}

/**
 * Resolve on `drain`; reject if the stream errors or closes first
 */
async function waitForDrain(stream: Writable): Promise<void> {
  const controller = new AbortController();
  const { signal } = controller;
  try {
    await Promise.race([
      once(stream, 'drain', { signal }),
      once(stream, 'close', { signal }).then(() => {
        throw new OutputWriteError(stream.errored ?? new Error('stream closed'));
      }),
    ]);
  } catch (error) {
    if (error instanceof OutputWriteError) throw error;
    throw new OutputWriteError(error);
  } finally {
    controller.abort();
  }
}
