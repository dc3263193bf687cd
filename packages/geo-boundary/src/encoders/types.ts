/**
 * Output Encoder Contract
 *
 * One encoder is chosen at startup and used for the whole run. The runner
 * calls `writeHeader` once, `writeRecord` per cell, and `writeFooter` once
 * after a clean end of input.
 *
 * @module encoders/types
 */

import type { Boundary } from '../core/types.js';

export interface OutputEncoder {
  /** A header has been written whose footer is still owed */
  readonly isOpen: boolean;

  writeHeader(): Promise<void>;
  writeRecord(label: string, boundary: Boundary): Promise<void>;
  writeFooter(): Promise<void>;
}
