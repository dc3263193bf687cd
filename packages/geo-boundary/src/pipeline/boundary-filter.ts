/**
 * Boundary Filter Runner
 *
 * Drives one run: header, one record per input line, footer. Ordering
 * guarantees:
 * - the header is written before the first line is read
 * - the footer is written once, after end-of-input, and never after a
 *   fatal error unless `closeKmlOnError` is set
 *
 * @module pipeline/boundary-filter
 */

import { FilterError, OutputWriteError, RecordError, withLine } from '../core/errors.js';
import type {
  FilterOptions,
  FilterStats,
  RunConfiguration,
} from '../core/types.js';
import { createEncoder } from '../encoders/index.js';
import type { CellGeometry } from '../geometry/cell-geometry.js';
import { readLines } from '../io/line-reader.js';
import type { OutputSink } from '../io/output-sink.js';
import type { CLILogger } from '../cli/lib/logger.js';
import { processRecord } from './record-processor.js';

export type FilterLogger = Pick<CLILogger, 'debug' | 'warn'>;

export interface BoundaryFilterParams {
  readonly input: AsyncIterable<Buffer | string>;
  readonly sink: OutputSink;
  readonly config: RunConfiguration;
  readonly options: FilterOptions;
  readonly geometry: CellGeometry;
  readonly logger: FilterLogger;
}

/**
 * Run the filter to end-of-input
 *
 * @returns Counters for the completed run
 * @throws FilterError on the first fatal error (read failure, oversized
 *   record, or a record error under the `fail` policy)
 */
export async function runBoundaryFilter(params: BoundaryFilterParams): Promise<FilterStats> {
  const { input, sink, config, options, geometry, logger } = params;
  const encoder = createEncoder(config, sink);

  await encoder.writeHeader();

  let read = 0;
  let written = 0;
  let skipped = 0;

  try {
    for await (const { text, line } of readLines(input, options)) {
      read++;
      try {
        await processRecord(text, geometry, encoder);
        written++;
      } catch (error) {
        if (!(error instanceof RecordError)) throw error;

        withLine(error, line);
        if (options.onRecordError !== 'skip' || !error.skippable) throw error;

        skipped++;
        logger.warn('Skipping record', { line, error: error.message });
      }
    }
  } catch (error) {
    // A failed output stream cannot take the footer either
    if (
      error instanceof FilterError &&
      !(error instanceof OutputWriteError) &&
      options.closeKmlOnError &&
      encoder.isOpen
    ) {
      logger.debug('Closing KML document after fatal error');
      await encoder.writeFooter();
    }
    throw error;
  }

  await encoder.writeFooter();

  const stats: FilterStats = { read, written, skipped };
  logger.debug('Reached end of input', { ...stats });
  return stats;
}
