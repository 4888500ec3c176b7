/**
 * @module mvt/layer
 *
 * Parsing of `Tile.Layer` messages.
 *
 * A layer is parsed in one linear scan over its fields:
 *
 * | Field    | No. | Handling                                              |
 * |----------|-----|-------------------------------------------------------|
 * | name     |   1 | string, last occurrence wins, required                |
 * | features |   2 | appended as unparsed views                            |
 * | keys     |   3 | appended to the key dictionary in arrival order       |
 * | values   |   4 | appended as unparsed views (decoded on lookup)        |
 * | extent   |   5 | uint32, last occurrence wins, required                |
 * | version  |  15 | uint32, last occurrence wins, required                |
 *
 * Any other field is skipped. Features and dictionary values stay as views
 * into the tile buffer until a caller asks for them.
 */

import {
  MissingRequiredFieldError,
  NotFoundError,
  OutOfRangeReferenceError,
  type RequiredLayerField,
} from '../errors.js';
import { resolveOptions, type DecodeOptions, type ResolvedDecodeOptions } from '../options.js';
import { ProtoReader } from '../pbf/reader.js';
import type { ByteView } from '../types.js';
import { Feature } from './feature.js';
import { decodeValue, type Value } from './value.js';

const LAYER_NAME = 1;
const LAYER_FEATURES = 2;
const LAYER_KEYS = 3;
const LAYER_VALUES = 4;
const LAYER_EXTENT = 5;
const LAYER_VERSION = 15;

/** Extent assumed while scanning, before the field is seen. */
export const DEFAULT_EXTENT = 4096;
/** Version assumed while scanning, before the field is seen. */
export const DEFAULT_VERSION = 1;

/**
 * Read only the name of a layer message, skipping every other field.
 *
 * Used by {@link Tile.parse} to key layers without parsing their bodies.
 *
 * @throws {MissingRequiredFieldError} If the layer has no name field.
 */
export function readLayerName(reader: ProtoReader, view: ByteView): string {
  let name = '';
  let hasName = false;
  reader.fields(view, (field) => {
    if (field === LAYER_NAME) {
      name = reader.string('Layer.name');
      hasName = true;
    }
  });
  if (!hasName) throw new MissingRequiredFieldError(['name']);
  return name;
}

/**
 * A parsed vector tile layer.
 *
 * Holds the key dictionary (duplicates allowed, index = arrival order), the
 * value dictionary as views, and one view per feature. Features are parsed
 * on each {@link getFeature} call and bound to this layer.
 *
 * @example
 * ```typescript
 * const layer = tile.getLayer('roads');
 * for (let i = 0; i < layer.featureCount(); i++) {
 *   const feature = layer.getFeature(i);
 *   console.log(feature.getValue('class'));
 * }
 * ```
 */
export class Layer {
  private constructor(
    private readonly reader: ProtoReader,
    private readonly options: ResolvedDecodeOptions,
    private readonly name: string,
    private readonly version: number,
    private readonly extent: number,
    private readonly keys: readonly string[],
    private readonly values: readonly ByteView[],
    private readonly features: readonly ByteView[],
  ) {}

  /**
   * Parse the layer message occupying `view`.
   *
   * @throws {MissingRequiredFieldError} Listing every absent field among
   *   version, extent and name.
   * @throws {PrimitiveReadError} On malformed protobuf data.
   */
  static parse(reader: ProtoReader, view: ByteView, options: ResolvedDecodeOptions): Layer {
    let name = '';
    let version = DEFAULT_VERSION;
    let extent = DEFAULT_EXTENT;
    let hasName = false;
    let hasVersion = false;
    let hasExtent = false;
    const keys: string[] = [];
    const values: ByteView[] = [];
    const features: ByteView[] = [];

    reader.fields(view, (field) => {
      switch (field) {
        case LAYER_NAME:
          name = reader.string('Layer.name');
          hasName = true;
          break;
        case LAYER_FEATURES:
          features.push(reader.view('Layer.features'));
          break;
        case LAYER_KEYS:
          keys.push(reader.string('Layer.keys'));
          break;
        case LAYER_VALUES:
          values.push(reader.view('Layer.values'));
          break;
        case LAYER_EXTENT:
          extent = reader.uint32('Layer.extent');
          hasExtent = true;
          break;
        case LAYER_VERSION:
          version = reader.uint32('Layer.version');
          hasVersion = true;
          break;
      }
    });

    const missing: RequiredLayerField[] = [];
    if (!hasVersion) missing.push('version');
    if (!hasExtent) missing.push('extent');
    if (!hasName) missing.push('name');
    if (missing.length > 0) throw new MissingRequiredFieldError(missing);

    return new Layer(reader, options, name, version, extent, keys, values, features);
  }

  /**
   * Parse a bare `Tile.Layer` message (not wrapped in a tile).
   *
   * @param bytes - The layer message bytes. Not copied.
   */
  static fromBytes(bytes: Uint8Array, options?: DecodeOptions): Layer {
    const reader = new ProtoReader(bytes);
    return Layer.parse(reader, reader.root, resolveOptions(options));
  }

  getName(): string {
    return this.name;
  }

  getVersion(): number {
    return this.version;
  }

  getExtent(): number {
    return this.extent;
  }

  featureCount(): number {
    return this.features.length;
  }

  /**
   * Parse the feature at `index`.
   *
   * @throws {NotFoundError} If `index` is not an integer in `[0, featureCount())`.
   */
  getFeature(index: number): Feature {
    const view = this.features[index];
    if (!Number.isInteger(index) || view === undefined) {
      throw new NotFoundError('feature', index);
    }
    return Feature.parse(this.reader, view, this, this.options);
  }

  /** Key dictionary, in wire order. May contain duplicate strings. */
  getKeys(): readonly string[] {
    return this.keys;
  }

  valueCount(): number {
    return this.values.length;
  }

  /**
   * Decode the value dictionary entry at `index`.
   *
   * @throws {OutOfRangeReferenceError} If `index` is outside the dictionary.
   */
  getDictionaryValue(index: number): Value {
    const view = this.values[index];
    if (!Number.isInteger(index) || view === undefined) {
      throw new OutOfRangeReferenceError('values', index, this.values.length);
    }
    return decodeValue(this.reader, view);
  }
}
