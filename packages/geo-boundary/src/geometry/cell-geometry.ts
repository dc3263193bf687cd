/**
 * Cell Geometry Collaborator
 *
 * The filter never looks inside a cell index. Decoding, canonical labels
 * and boundary lookup all go through this interface; the production
 * implementation delegates the grid mathematics to h3-js.
 *
 * @module geometry/cell-geometry
 */

import { cellToBoundary } from 'h3-js';
import { CellLookupError, InvalidRecordError } from '../core/errors.js';
import type { Boundary, CellIndex } from '../core/types.js';

export interface CellGeometry {
  /**
   * Decode one input record into a cell index
   *
   * @throws InvalidRecordError when the record is not an index
   */
  decode(text: string): CellIndex;

  /** Canonical string form of the index */
  canonicalLabel(cell: CellIndex): string;

  /**
   * Boundary vertices of the cell, as latitude/longitude degrees
   *
   * @throws CellLookupError when the grid library rejects the cell
   */
  boundaryOf(cell: CellIndex): Boundary;
}

/** 1 to 16 hex digits, i.e. anything that fits a 64-bit index */
const HEX_INDEX_PATTERN = /^[0-9a-f]{1,16}$/i;

/**
 * CellGeometry backed by h3-js
 */
export class H3CellGeometry implements CellGeometry {
  decode(text: string): CellIndex {
    const token = text.trim();
    if (!HEX_INDEX_PATTERN.test(token)) {
      throw new InvalidRecordError(token);
    }
    return BigInt(`0x${token}`).toString(16);
  }

  canonicalLabel(cell: CellIndex): string {
    return cell;
  }

  boundaryOf(cell: CellIndex): Boundary {
    let vertices: number[][];
    try {
      vertices = cellToBoundary(cell);
    } catch (error) {
      throw new CellLookupError(cell, error);
    }

    return vertices.map(([lat, lng]) => {
      if (!Number.isFinite(lat) || !Number.isFinite(lng)) {
        throw new CellLookupError(cell, new Error('non-finite vertex'));
      }
      return [lat, lng] as const;
    });
  }
}
