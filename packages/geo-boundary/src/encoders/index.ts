/**
 * Encoder selection
 *
 * @module encoders
 */

import type { RunConfiguration } from '../core/types.js';
import type { OutputSink } from '../io/output-sink.js';
import { KmlEncoder } from './kml-encoder.js';
import { PlainTextEncoder } from './plain-text-encoder.js';
import type { OutputEncoder } from './types.js';

export { KmlEncoder, KML_NAMESPACE, closeRing, escapeXml } from './kml-encoder.js';
export type { KmlDocumentInfo } from './kml-encoder.js';
export { PlainTextEncoder } from './plain-text-encoder.js';
export type { OutputEncoder } from './types.js';

/**
 * Build the encoder for the run's output mode
 */
export function createEncoder(config: RunConfiguration, sink: OutputSink): OutputEncoder {
  switch (config.mode) {
    case 'kml':
      return new KmlEncoder(sink, {
        name: config.kmlName,
        description: config.kmlDescription,
      });
    case 'text':
      return new PlainTextEncoder(sink);
  }
}
