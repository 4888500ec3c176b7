/**
 * @module lazy-mvt
 *
 * Public API surface for the lazy-mvt library.
 *
 * lazy-mvt decodes a single Mapbox Vector Tile without materializing it up
 * front. Each level of the tile is parsed only when asked for:
 *
 * | Call | Parses | Cost |
 * |------|--------|------|
 * | {@link Tile.parse} | Top-level message, layer names | One pass over the tile |
 * | {@link Tile.getLayer} | One layer's fields and dictionaries | One pass over the layer |
 * | {@link Layer.getFeature} | One feature's fields | One pass over the feature |
 * | {@link Feature.getValue} | One dictionary value | Tag stream up to the match |
 * | {@link Feature.getProperties} | Every referenced value | Whole tag stream |
 * | {@link Feature.getGeometries} | The geometry command stream | Whole geometry |
 *
 * Decoding is synchronous. Byte regions are kept as views into the caller's
 * buffer and never copied.
 *
 * @example
 * ```typescript
 * import { Tile, INT16 } from 'lazy-mvt';
 *
 * const tile = Tile.parse(bytes, { onWarning: console.warn });
 * const roads = tile.getLayer('roads');
 * const feature = roads.getFeature(0);
 *
 * feature.getValue('class');                                   // { type: 'string', value: 'motorway' }
 * feature.getGeometries(512 / roads.getExtent(), INT16);        // [Int16Array [...]]
 * ```
 */

// ─── Decoder ────────────────────────────────────────────────────────────────

export { Tile } from './tile.js';
export { Layer, DEFAULT_EXTENT, DEFAULT_VERSION } from './mvt/layer.js';
export { Feature, DUPLICATE_KEY_WARNING } from './mvt/feature.js';
export { NULL_VALUE, toPlainValue } from './mvt/value.js';
export {
  INT8,
  UINT8,
  INT16,
  UINT16,
  INT32,
  UINT32,
  unzigzag,
} from './mvt/geometry.js';
export { GeomType } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────────────────

export {
  DecodeError,
  MissingRequiredFieldError,
  MalformedTagStreamError,
  OutOfRangeReferenceError,
  UnknownCommandError,
  CoordinateOutOfRangeError,
  MalformedGeometryError,
  NotFoundError,
  PrimitiveReadError,
  isDecodeError,
} from './errors.js';

// ─── Options ────────────────────────────────────────────────────────────────

export { DEFAULT_DECODE_OPTIONS, MAX_RESERVED_POINTS } from './options.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type { DecodeOptions, WarningSink } from './options.js';
export type { DecodeErrorKind, RequiredLayerField } from './errors.js';
export type { Value, ValueType } from './mvt/value.js';
export type {
  ByteView,
  CoordinateArray,
  CoordinateKind,
  Identifier,
  Int64,
  Paths,
} from './types.js';
