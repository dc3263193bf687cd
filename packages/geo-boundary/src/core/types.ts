/**
 * Core Types for the Cell Boundary Filter
 *
 * @module core/types
 */

/**
 * H3 index in canonical string form (lowercase hex, no leading zeros).
 * Treated as opaque by everything except the geometry adapter.
 */
export type CellIndex = string;

/**
 * Geographic coordinate in degrees
 */
export type LatLng = readonly [lat: number, lng: number];

/**
 * Polygon perimeter of one cell. Closure is implicit: the last vertex
 * connects back to the first.
 */
export type Boundary = readonly LatLng[];

/**
 * Output protocol, fixed for the lifetime of a run
 */
export type OutputMode = 'text' | 'kml';

/**
 * Run configuration taken from the positional arguments
 */
export interface RunConfiguration {
  readonly mode: OutputMode;
  readonly kmlName: string;
  readonly kmlDescription: string;
}

/**
 * What to do with a record the geometry collaborator rejects
 */
export type RecordErrorPolicy = 'fail' | 'skip';

/**
 * Pipeline options taken from the configuration layer
 */
export interface FilterOptions {
  /** Longest accepted input line, in characters */
  readonly maxRecordLength: number;
  readonly onRecordError: RecordErrorPolicy;
  /** Write the KML footer before reporting a fatal error */
  readonly closeKmlOnError: boolean;
}

/**
 * Counters reported at the end of a run
 */
export interface FilterStats {
  readonly read: number;
  readonly written: number;
  readonly skipped: number;
}
