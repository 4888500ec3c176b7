/**
 * @module types
 *
 * Shared type definitions for the lazy-mvt decoder.
 *
 * This module defines the data structures that flow between decode stages:
 *
 * - **GeomType**: MVT feature geometry type
 * - **ByteView**: an unparsed region of the tile buffer
 * - **Int64 / Identifier**: exact 64-bit integers and the optional feature id
 * - **CoordinateKind / Paths**: typed-array layout of decoded geometry
 *
 * All coordinate arrays use the flat interleaved layout `[x0, y0, x1, y1, ...]`.
 */

// ─── Geometry Types ─────────────────────────────────────────────────────────

/**
 * MVT geometry type constants per the Mapbox Vector Tile 2.1 specification.
 *
 * Wire values outside this range decode as `Unknown`.
 *
 * @see {@link https://github.com/mapbox/vector-tile-spec/blob/master/2.1/vector_tile.proto | MVT 2.1 Spec}
 */
export enum GeomType {
  Unknown = 0,
  Point = 1,
  LineString = 2,
  Polygon = 3,
}

// ─── Byte Views ─────────────────────────────────────────────────────────────

/**
 * A half-open byte range `[start, end)` inside the tile's backing buffer.
 *
 * Offsets are absolute positions in the underlying `ArrayBuffer`, so every
 * view taken from one tile can be read through the same
 * {@link ProtoReader} without copying.
 */
export interface ByteView {
  readonly start: number;
  readonly end: number;
}

/** A view covering no bytes. Used for absent packed fields. */
export const EMPTY_VIEW: ByteView = { start: 0, end: 0 };

// ─── Features ───────────────────────────────────────────────────────────────

/**
 * A decoded 64-bit integer: a `number` while it lies within
 * `Number.MAX_SAFE_INTEGER`, a `bigint` beyond that.
 */
export type Int64 = number | bigint;

/**
 * Feature identifier (`uint64` on the wire), or `null` when the feature
 * carries no id.
 */
export type Identifier = Int64 | null;

// ─── Coordinates ────────────────────────────────────────────────────────────

/** Typed arrays that decoded geometry paths can be materialized into. */
export type CoordinateArray =
  | Int8Array
  | Uint8Array
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array;

/**
 * Target integer coordinate type for geometry decoding.
 *
 * `min` and `max` bound every scaled coordinate: a point outside that range
 * fails with {@link CoordinateOutOfRangeError} instead of being clamped.
 */
export interface CoordinateKind<A extends CoordinateArray = CoordinateArray> {
  /** Short name used in error messages (e.g. `"int16"`). */
  readonly name: string;
  /** Smallest representable coordinate. */
  readonly min: number;
  /** Largest representable coordinate. */
  readonly max: number;
  /** Allocate a zero-filled array holding `length` coordinates. */
  create(length: number): A;
}

/**
 * Decoded geometry: one typed array per path (ring, line or point run),
 * each holding interleaved `[x0, y0, x1, y1, ...]` coordinates.
 */
export type Paths<A extends CoordinateArray = Int32Array> = A[];
