/**
 * Filter Error Types
 *
 * Every failure that ends a run is a FilterError carrying the process
 * exit code it maps to. Record-level errors also carry the 1-based input
 * line number when the runner knows it.
 *
 * @module core/errors
 */

import { EXIT_CODES, type ExitCode } from './constants.js';

/**
 * Base class for all filter failures
 */
export abstract class FilterError extends Error {
  abstract readonly exitCode: ExitCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;

    // Maintain proper stack trace for where error was thrown (V8 only)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Invalid output mode, option value or configuration file
 */
export class ConfigurationError extends FilterError {
  readonly exitCode = EXIT_CODES.CONFIG_ERROR;
}

/**
 * The input stream failed for a reason other than reaching its end
 */
export class InputReadError extends FilterError {
  readonly exitCode = EXIT_CODES.IO_ERROR;

  constructor(cause: unknown) {
    super(
      `reading H3 index from input: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

/**
 * The output stream failed or closed before a write completed
 */
export class OutputWriteError extends FilterError {
  readonly exitCode = EXIT_CODES.ERRORS;

  constructor(cause: unknown) {
    super(`writing output: ${cause instanceof Error ? cause.message : String(cause)}`, {
      cause,
    });
  }
}

/**
 * Base class for failures tied to one input record
 */
export abstract class RecordError extends FilterError {
  readonly exitCode = EXIT_CODES.ERRORS;

  /** 1-based input line, when known */
  line?: number;

  /**
   * Whether the skip policy may continue past this error
   */
  abstract readonly skippable: boolean;
}

/**
 * An input line exceeded the maximum record length
 */
export class RecordTooLongError extends RecordError {
  readonly skippable = false;

  constructor(
    readonly maxRecordLength: number,
    line: number
  ) {
    super(`record on line ${line} exceeds ${maxRecordLength} characters`);
    this.line = line;
  }
}

/**
 * The record is not a hexadecimal H3 index
 */
export class InvalidRecordError extends RecordError {
  readonly skippable = true;

  constructor(readonly record: string) {
    super(
      record.length === 0
        ? 'empty record'
        : `not an H3 index: ${JSON.stringify(record)}`
    );
  }
}

/**
 * The grid library could not produce a boundary for the cell
 */
export class CellLookupError extends RecordError {
  readonly skippable = true;

  constructor(
    readonly cell: string,
    cause: unknown
  ) {
    super(
      `no boundary for cell ${cell}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
  }
}

/**
 * Attach an input line number to a record error that lacks one
 */
export function withLine<E extends RecordError>(error: E, line: number): E {
  if (error.line === undefined) {
    error.line = line;
  }
  return error;
}
