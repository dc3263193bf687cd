/**
 * KML Encoder
 *
 * Writes one KML document per run: the header opens the document and a
 * folder, each record adds a polygon placemark, and the footer closes
 * what the header opened. Coordinates are `lng,lat`, as KML requires.
 *
 * A document without its footer is truncated. The encoder refuses calls
 * out of order so that a caller bug cannot produce malformed XML.
 *
 * @module encoders/kml-encoder
 */

import { KML_COORDINATE_PRECISION } from '../core/constants.js';
import type { Boundary, LatLng } from '../core/types.js';
import type { OutputSink } from '../io/output-sink.js';
import type { OutputEncoder } from './types.js';

export const KML_NAMESPACE = 'http://www.opengis.net/kml/2.2';

const STYLE_ID = 'cellBoundary';

type KmlPhase = 'pending' | 'open' | 'closed';

export interface KmlDocumentInfo {
  readonly name: string;
  readonly description: string;
}

export class KmlEncoder implements OutputEncoder {
  private phase: KmlPhase = 'pending';

  constructor(
    private readonly sink: OutputSink,
    private readonly info: KmlDocumentInfo
  ) {}

  /** True once the header has been written and the footer has not */
  get isOpen(): boolean {
    return this.phase === 'open';
  }

  async writeHeader(): Promise<void> {
    this.expectPhase('pending', 'header');
    this.phase = 'open';

    const lines: string[] = [];
    lines.push('<?xml version="1.0" encoding="UTF-8"?>');
    lines.push(`<kml xmlns="${KML_NAMESPACE}">`);
    lines.push('  <Document>');
    lines.push(`    <name>${escapeXml(this.info.name)}</name>`);
    lines.push(`    <description>${escapeXml(this.info.description)}</description>`);
    lines.push(
      `    <Style id="${STYLE_ID}">` +
        '<LineStyle><color>ff0000ff</color><width>2</width></LineStyle>' +
        '<PolyStyle><fill>0</fill></PolyStyle>' +
        '</Style>'
    );
    lines.push('    <Folder>');

    await this.sink.write(`${lines.join('\n')}\n`);
  }

  async writeRecord(label: string, boundary: Boundary): Promise<void> {
    this.expectPhase('open', 'record');

    const lines: string[] = [];
    lines.push('      <Placemark>');
    lines.push(`        <name>${escapeXml(label)}</name>`);
    lines.push(`        <styleUrl>#${STYLE_ID}</styleUrl>`);
    lines.push('        <Polygon>');
    lines.push('          <outerBoundaryIs>');
    lines.push('            <LinearRing>');
    lines.push('              <coordinates>');
    for (const vertex of closeRing(boundary)) {
      lines.push(`                ${formatTuple(vertex)}`);
    }
    lines.push('              </coordinates>');
    lines.push('            </LinearRing>');
    lines.push('          </outerBoundaryIs>');
    lines.push('        </Polygon>');
    lines.push('      </Placemark>');

    await this.sink.write(`${lines.join('\n')}\n`);
  }

  async writeFooter(): Promise<void> {
    this.expectPhase('open', 'footer');
    this.phase = 'closed';

    await this.sink.write('    </Folder>\n  </Document>\n</kml>\n');
  }

  private expectPhase(expected: KmlPhase, part: string): void {
    if (this.phase !== expected) {
      throw new Error(`KML ${part} written while document is ${this.phase}`);
    }
  }
}

/**
 * Return the ring with its first vertex repeated at the end, unless the
 * boundary already ends where it starts
 */
export function closeRing(boundary: Boundary): Boundary {
  if (boundary.length === 0) return boundary;

  const first = boundary[0];
  const last = boundary[boundary.length - 1];
  if (first[0] === last[0] && first[1] === last[1]) {
    return boundary;
  }
  return [...boundary, first];
}

function formatTuple([lat, lng]: LatLng): string {
  return `${lng.toFixed(KML_COORDINATE_PRECISION)},${lat.toFixed(KML_COORDINATE_PRECISION)}`;
}

// C0 controls other than tab, LF and CR are not allowed anywhere in XML 1.0
const XML_FORBIDDEN_CONTROLS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g;

/**
 * Escape markup characters and drop control characters XML cannot carry
 */
export function escapeXml(str: string): string {
  return str
    .replace(XML_FORBIDDEN_CONTROLS, '')
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}
