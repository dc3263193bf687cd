/**
 * Shared constants
 *
 * @module core/constants
 */

import type { FilterOptions } from './types.js';

/** KML `<name>` when none is given on the command line */
export const DEFAULT_KML_NAME = 'geo from H3';

/**
 * KML `<description>` when none is given on the command line.
 * Older usage text advertised "generated by h3ToGeoBoundary"; the value
 * actually emitted has always been this one.
 */
export const DEFAULT_KML_DESCRIPTION = 'from h3ToGeo';

/** Decimal places for plain-text vertex lines */
export const TEXT_COORDINATE_PRECISION = 9;

/** Decimal places for KML coordinate tuples */
export const KML_COORDINATE_PRECISION = 6;

export const DEFAULT_FILTER_OPTIONS: FilterOptions = {
  maxRecordLength: 256,
  onRecordError: 'fail',
  closeKmlOnError: false,
};

// ============================================================================
// Exit Codes
// ============================================================================

export const EXIT_CODES = {
  SUCCESS: 0,
  USAGE_ERROR: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  IO_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
