/**
 * @module tile
 *
 * Entry point of the decoder: splitting a tile into named layers.
 *
 * {@link Tile.parse} makes one pass over the top-level `Tile` message and
 * records a view per `layers` field (field 3). Each layer is then
 * shallow-scanned for its name only; the rest of the layer body is left
 * untouched until {@link Tile.getLayer} is called, so a malformed layer body
 * only fails the call that parses it.
 *
 * Duplicate layer names follow last-write-wins: the later layer replaces
 * the earlier one, while the name keeps the position it was first seen at.
 *
 * @example
 * ```typescript
 * import { Tile } from 'lazy-mvt';
 *
 * const tile = Tile.parse(bytes);
 * for (const name of tile.layerNames()) {
 *   const layer = tile.getLayer(name);
 *   console.log(name, layer.featureCount(), layer.getExtent());
 * }
 * ```
 */

import { NotFoundError } from './errors.js';
import { readLayerName, Layer } from './mvt/layer.js';
import { resolveOptions, type DecodeOptions, type ResolvedDecodeOptions } from './options.js';
import { ProtoReader } from './pbf/reader.js';
import type { ByteView } from './types.js';

const TILE_LAYERS = 3;

/**
 * A vector tile split into unparsed layers.
 *
 * The tile keeps a reference to the caller's buffer rather than a copy; the
 * buffer must not be modified while the tile or anything derived from it is
 * in use.
 */
export class Tile {
  private constructor(
    private readonly reader: ProtoReader,
    private readonly layers: ReadonlyMap<string, ByteView>,
    private readonly options: ResolvedDecodeOptions,
  ) {}

  /**
   * Split `bytes` into named layer views.
   *
   * @param bytes - Raw (already decompressed) tile bytes. Not copied.
   * @param options - Decode options inherited by every layer and feature.
   * @throws {MissingRequiredFieldError} If any layer has no name.
   * @throws {PrimitiveReadError} If the top-level message is malformed.
   */
  static parse(bytes: Uint8Array, options?: DecodeOptions): Tile {
    const resolved = resolveOptions(options);
    const reader = new ProtoReader(bytes);

    const views: ByteView[] = [];
    reader.fields(reader.root, (field) => {
      if (field === TILE_LAYERS) views.push(reader.view('Tile.layers'));
    });

    const layers = new Map<string, ByteView>();
    for (const view of views) {
      layers.set(readLayerName(reader, view), view);
    }

    return new Tile(reader, layers, resolved);
  }

  get layerCount(): number {
    return this.layers.size;
  }

  /** Layer names in the order they were first seen. */
  layerNames(): string[] {
    return [...this.layers.keys()];
  }

  hasLayer(name: string): boolean {
    return this.layers.has(name);
  }

  /**
   * Parse the layer called `name`.
   *
   * The layer is parsed again on every call; cache the result to avoid
   * repeated work.
   *
   * @throws {NotFoundError} If the tile has no such layer.
   * @throws {MissingRequiredFieldError | PrimitiveReadError} If the layer is malformed.
   */
  getLayer(name: string): Layer {
    return Layer.parse(this.reader, this.layerView(name), this.options);
  }

  /**
   * The raw `Tile.Layer` message bytes for `name`, as a subarray sharing
   * the tile's buffer.
   *
   * @throws {NotFoundError} If the tile has no such layer.
   */
  getLayerBytes(name: string): Uint8Array {
    return this.reader.slice(this.layerView(name));
  }

  private layerView(name: string): ByteView {
    const view = this.layers.get(name);
    if (view === undefined) throw new NotFoundError('layer', name);
    return view;
  }
}
