/**
 * h3-to-geo-boundary
 *
 * Streaming filter from H3 indexes to cell boundaries, as plain text or KML.
 *
 * @packageDocumentation
 */

// Core types and errors
export * from './core/types.js';
export * from './core/constants.js';
export * from './core/errors.js';

// Collaborators and I/O
export { H3CellGeometry, type CellGeometry } from './geometry/cell-geometry.js';
export { readLines, type InputLine, type ReadLinesOptions } from './io/line-reader.js';
export { createOutputSink, type OutputSink } from './io/output-sink.js';

// Encoders
export * from './encoders/index.js';

// Pipeline
export { processRecord } from './pipeline/record-processor.js';
export {
  runBoundaryFilter,
  type BoundaryFilterParams,
  type FilterLogger,
} from './pipeline/boundary-filter.js';

// CLI
export {
  runCli,
  guardOutputStream,
  parseOutputMode,
  createRunConfiguration,
  CLI_NAME,
  type CliIO,
} from './cli/program.js';
export { loadConfig, validateConfig, type CLIConfig } from './cli/lib/config.js';
export { CLILogger, createCLILogger, type LogLevel } from './cli/lib/logger.js';
