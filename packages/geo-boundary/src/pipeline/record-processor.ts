/**
 * Record Processor
 *
 * Turns one raw input line into one encoder call. Collaborator errors are
 * not caught here; the runner decides whether they end the run.
 *
 * @module pipeline/record-processor
 */

import type { OutputEncoder } from '../encoders/types.js';
import type { CellGeometry } from '../geometry/cell-geometry.js';

export async function processRecord(
  raw: string,
  geometry: CellGeometry,
  encoder: OutputEncoder
): Promise<void> {
  const cell = geometry.decode(raw);
  const label = geometry.canonicalLabel(cell);
  const boundary = geometry.boundaryOf(cell);
  await encoder.writeRecord(label, boundary);
}
