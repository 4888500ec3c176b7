/**
 * @module mvt/feature
 *
 * Parsing of `Tile.Feature` messages and property resolution.
 *
 * | Field    | No. | Handling                                   |
 * |----------|-----|--------------------------------------------|
 * | id       |   1 | uint64, optional                           |
 * | tags     |   2 | packed uint32, kept as a view              |
 * | type     |   3 | enum, out-of-range values become `Unknown` |
 * | geometry |   4 | packed uint32, kept as a view              |
 *
 * The tag stream is a flat run of `[keyIndex, valueIndex, ...]` pairs into
 * the owning layer's dictionaries. Nothing is resolved at parse time:
 * {@link Feature.getValue} decodes the single value it needs and
 * {@link Feature.getProperties} walks the whole stream once.
 */

import {
  MalformedTagStreamError,
  OutOfRangeReferenceError,
} from '../errors.js';
import type { ResolvedDecodeOptions, WarningSink } from '../options.js';
import type { PackedCursor, ProtoReader } from '../pbf/reader.js';
import { EMPTY_VIEW, GeomType } from '../types.js';
import type { ByteView, CoordinateArray, CoordinateKind, Identifier, Paths } from '../types.js';
import { decodeGeometry, INT32 } from './geometry.js';
import type { Layer } from './layer.js';
import { NULL_VALUE, type Value } from './value.js';

const FEATURE_ID = 1;
const FEATURE_TAGS = 2;
const FEATURE_TYPE = 3;
const FEATURE_GEOMETRY = 4;

export const DUPLICATE_KEY_WARNING = 'duplicate keys with different tag ids';

/**
 * Map a wire `GeomType` enum value to {@link GeomType}, folding unknown
 * values into `Unknown`.
 */
export function toGeomType(raw: number): GeomType {
  switch (raw) {
    case 1:
      return GeomType.Point;
    case 2:
      return GeomType.LineString;
    case 3:
      return GeomType.Polygon;
    default:
      return GeomType.Unknown;
  }
}

/**
 * A parsed vector tile feature, bound to the {@link Layer} it came from.
 *
 * @example
 * ```typescript
 * const feature = layer.getFeature(0);
 * feature.getType();                 // GeomType.Polygon
 * feature.getValue('height');        // { type: 'double', value: 12.5 }
 * feature.getGeometries(512 / 4096); // [Int32Array [...], ...]
 * ```
 */
export class Feature {
  private constructor(
    private readonly reader: ProtoReader,
    private readonly layer: Layer,
    private readonly options: ResolvedDecodeOptions,
    private readonly id: Identifier,
    private readonly type: GeomType,
    private readonly tags: ByteView,
    private readonly geometry: ByteView,
  ) {}

  /**
   * Parse the feature message occupying `view`.
   *
   * No field is required: a feature without tags has no properties and one
   * without geometry decodes to no paths.
   *
   * @throws {PrimitiveReadError} On malformed protobuf data.
   */
  static parse(
    reader: ProtoReader,
    view: ByteView,
    layer: Layer,
    options: ResolvedDecodeOptions,
  ): Feature {
    let id: Identifier = null;
    let type = GeomType.Unknown;
    let tags = EMPTY_VIEW;
    let geometry = EMPTY_VIEW;

    reader.fields(view, (field) => {
      switch (field) {
        case FEATURE_ID:
          id = reader.uint64('Feature.id');
          break;
        case FEATURE_TAGS:
          tags = reader.view('Feature.tags');
          break;
        case FEATURE_TYPE:
          type = toGeomType(reader.uint32('Feature.type'));
          break;
        case FEATURE_GEOMETRY:
          geometry = reader.view('Feature.geometry');
          break;
      }
    });

    return new Feature(reader, layer, options, id, type, tags, geometry);
  }

  getId(): Identifier {
    return this.id;
  }

  getType(): GeomType {
    return this.type;
  }

  getLayer(): Layer {
    return this.layer;
  }

  getExtent(): number {
    return this.layer.getExtent();
  }

  getVersion(): number {
    return this.layer.getVersion();
  }

  /**
   * Look up one property by key.
   *
   * Every key-dictionary index holding `key` is a candidate; the first tag
   * pair in stream order whose key index is a candidate wins, and only its
   * value is decoded. When more than one dictionary index holds `key` and a
   * match is found, {@link DUPLICATE_KEY_WARNING} is sent to `onWarning`
   * (or the tile's sink) and the lookup still succeeds.
   *
   * @returns The value, or the `null` value when the key is absent.
   * @throws {MalformedTagStreamError} If the tag stream has an odd length.
   * @throws {OutOfRangeReferenceError} If a pair read before the match
   *   points outside a dictionary.
   */
  getValue(key: string, onWarning?: WarningSink): Value {
    const keys = this.layer.getKeys();
    const candidates: number[] = [];
    for (let i = 0; i < keys.length; i++) {
      if (keys[i] === key) candidates.push(i);
    }
    if (candidates.length === 0) return NULL_VALUE;

    const pairs = this.tagPairs();
    while (!pairs.done) {
      const keyIndex = pairs.next();
      const valueIndex = pairs.next();
      this.checkReference(keyIndex, valueIndex);

      if (candidates.includes(keyIndex)) {
        if (candidates.length > 1) {
          (onWarning ?? this.options.onWarning)?.(`${DUPLICATE_KEY_WARNING} (key "${key}")`);
        }
        return this.layer.getDictionaryValue(valueIndex);
      }
    }

    return NULL_VALUE;
  }

  /**
   * Resolve every tag pair into a key → value map.
   *
   * Insertion order follows the tag stream. A key that appears again later
   * in the stream keeps its first value, so each entry equals what
   * {@link getValue} returns for that key.
   *
   * @throws {MalformedTagStreamError} If the tag stream has an odd length.
   * @throws {OutOfRangeReferenceError} If any pair points outside a dictionary.
   */
  getProperties(): Map<string, Value> {
    const keys = this.layer.getKeys();
    const properties = new Map<string, Value>();

    const pairs = this.tagPairs();
    while (!pairs.done) {
      const keyIndex = pairs.next();
      const valueIndex = pairs.next();
      this.checkReference(keyIndex, valueIndex);

      const key = keys[keyIndex];
      if (!properties.has(key)) {
        properties.set(key, this.layer.getDictionaryValue(valueIndex));
      }
    }

    return properties;
  }

  /**
   * Decode the feature geometry into typed coordinate paths.
   *
   * @param scale - Linear factor applied to every coordinate, e.g.
   *   `512 / extent` to go from tile units to pixels.
   * @param kind - Target coordinate type. @defaultValue {@link INT32}
   * @throws {UnknownCommandError | MalformedGeometryError | CoordinateOutOfRangeError}
   *   No partial geometry is returned.
   */
  getGeometries(scale: number): Paths<Int32Array>;
  getGeometries<A extends CoordinateArray>(scale: number, kind: CoordinateKind<A>): Paths<A>;
  getGeometries(scale: number, kind: CoordinateKind = INT32): Paths<CoordinateArray> {
    return decodeGeometry(
      this.reader.packed(this.geometry),
      this.type,
      scale,
      kind,
      this.options.maxReservedPoints,
    );
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /** Cursor over the tag stream, after checking it holds whole pairs. */
  private tagPairs(): PackedCursor {
    const cursor = this.reader.packed(this.tags);
    const length = cursor.count();
    if (length % 2 !== 0) throw new MalformedTagStreamError(length);
    return cursor;
  }

  private checkReference(keyIndex: number, valueIndex: number): void {
    const keyCount = this.layer.getKeys().length;
    if (keyIndex >= keyCount) {
      throw new OutOfRangeReferenceError('keys', keyIndex, keyCount);
    }
    const valueCount = this.layer.valueCount();
    if (valueIndex >= valueCount) {
      throw new OutOfRangeReferenceError('values', valueIndex, valueCount);
    }
  }
}
