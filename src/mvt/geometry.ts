/**
 * @module mvt/geometry
 *
 * MVT 2.1 geometry command decoding.
 *
 * The Mapbox Vector Tile specification encodes geometries as a sequence of
 * **command integers** interleaved with **parameter integers**. Three commands
 * are defined:
 *
 * | Command   | ID | Parameters           | Meaning                                |
 * |-----------|----|----------------------|----------------------------------------|
 * | MoveTo    |  1 | `count` x (dX, dY)   | Start `count` new path segment(s)      |
 * | LineTo    |  2 | `count` x (dX, dY)   | Extend the current path by `count` edges |
 * | ClosePath |  7 | *(none)*              | Close the current ring (polygon only)  |
 *
 * A **command integer** packs both the command ID and a repeat count into a
 * single unsigned integer:
 *
 *     command_integer = (command_id & 0x7) | (count << 3)
 *
 * Parameter integers are **zigzag-encoded deltas** relative to a running cursor
 * position that starts at (0, 0) and persists across all geometry parts within
 * a single feature.
 *
 * The command count is attacker-controlled. For `MoveTo` and `LineTo` it is
 * only used as a capacity hint, clamped to `maxReservedPoints`, and each
 * repetition must be backed by parameters in the stream. `ClosePath` takes
 * no parameters, so its count is not honoured: it always closes once.
 *
 * @see {@link https://github.com/mapbox/vector-tile-spec/blob/master/2.1/vector_tile.proto | MVT 2.1 Spec}
 */

import {
  CoordinateOutOfRangeError,
  MalformedGeometryError,
  UnknownCommandError,
} from '../errors.js';
import type { PackedCursor } from '../pbf/reader.js';
import { GeomType } from '../types.js';
import type { CoordinateArray, CoordinateKind, Paths } from '../types.js';

const CMD_MOVE_TO = 1;
const CMD_LINE_TO = 2;
const CMD_CLOSE_PATH = 7;

// ─── Coordinate kinds ───────────────────────────────────────────────────────

export const INT8: CoordinateKind<Int8Array> = {
  name: 'int8', min: -0x80, max: 0x7f, create: (length) => new Int8Array(length),
};

export const UINT8: CoordinateKind<Uint8Array> = {
  name: 'uint8', min: 0, max: 0xff, create: (length) => new Uint8Array(length),
};

export const INT16: CoordinateKind<Int16Array> = {
  name: 'int16', min: -0x8000, max: 0x7fff, create: (length) => new Int16Array(length),
};

export const UINT16: CoordinateKind<Uint16Array> = {
  name: 'uint16', min: 0, max: 0xffff, create: (length) => new Uint16Array(length),
};

export const INT32: CoordinateKind<Int32Array> = {
  name: 'int32', min: -0x80000000, max: 0x7fffffff, create: (length) => new Int32Array(length),
};

export const UINT32: CoordinateKind<Uint32Array> = {
  name: 'uint32', min: 0, max: 0xffffffff, create: (length) => new Uint32Array(length),
};

// ─── Scalar helpers ─────────────────────────────────────────────────────────

/**
 * Zigzag-decode an unsigned 32-bit integer to a signed integer.
 *
 * The mapping is: 0 -> 0, 1 -> -1, 2 -> 1, 3 -> -2, 4 -> 2, ...
 *
 * @example
 * ```ts
 * unzigzag(0);  // 0
 * unzigzag(1);  // -1
 * unzigzag(2);  // 1
 * unzigzag(3);  // -2
 * ```
 */
export function unzigzag(n: number): number {
  return (n >>> 1) ^ -(n & 1);
}

/**
 * Clamp a command's declared repeat count to the reservation cap.
 *
 * The result is only ever used to size an allocation; the full declared
 * count still drives the command loop.
 */
export function reservationHint(count: number, maxReservedPoints: number): number {
  return count < maxReservedPoints ? count : maxReservedPoints;
}

/**
 * Scale a tile coordinate in single precision and round half away from zero.
 */
export function scaleCoordinate(value: number, scale: number): number {
  const scaled = Math.fround(Math.fround(value) * scale);
  return scaled < 0 ? -Math.round(-scaled) : Math.round(scaled);
}

// ─── Decoder ────────────────────────────────────────────────────────────────

/**
 * Interpreter state for one pass over a feature's command stream.
 *
 * Kept as a single local record so the whole state machine is visible in
 * {@link decodeGeometry}.
 */
interface DecodeState<A extends CoordinateArray> {
  /** Running absolute position (sum of all deltas so far). */
  x: number;
  y: number;
  /** Current command id and the repetitions still to execute. */
  command: number;
  remaining: number;
  /** Clamped repeat count of the current command. */
  hint: number;
  /** Path under construction; `size` coordinates are populated. */
  path: A;
  size: number;
  /** No capacity reservation has been made for the current path yet. */
  first: boolean;
}

/**
 * Decode a packed command stream into typed coordinate paths.
 *
 * - `MoveTo` on a path that already has points starts a new path.
 * - `LineTo` extends the current path.
 * - `ClosePath` appends one copy of the current path's first point,
 *   whatever its count; on an empty path it does nothing.
 * - A command with count 0 is skipped.
 * - `GeomType.Unknown` runs the same interpreter.
 *
 * Each point is `round(coordinate * scale)` and must fit `kind`. Paths are
 * shrunk to their exact length before being returned; an empty trailing
 * path is dropped, so a stream with no points yields `[]`.
 *
 * @param commands - Cursor over the feature's `geometry` field.
 * @param type - Feature geometry type; sizes the reservation per path.
 * @param scale - Linear factor applied to every coordinate (single precision).
 * @param kind - Target coordinate type.
 * @param maxReservedPoints - Cap on points reserved from one command count.
 * @throws {UnknownCommandError} On a command id other than 1, 2 or 7.
 * @throws {MalformedGeometryError} When the stream ends between `dx` and `dy`.
 * @throws {CoordinateOutOfRangeError} When a scaled point does not fit `kind`.
 *
 * @example
 * ```ts
 * // MoveTo(2, 2) LineTo(0, 5)  →  [[2, 2, 2, 7]]
 * const paths = decodeGeometry(cursor, GeomType.LineString, 1, INT32, 65536);
 * ```
 */
export function decodeGeometry<A extends CoordinateArray>(
  commands: PackedCursor,
  type: GeomType,
  scale: number,
  kind: CoordinateKind<A>,
  maxReservedPoints: number,
): Paths<A> {
  const factor = Math.fround(scale);
  const isPoint = type === GeomType.Point;
  // Points beyond the LineTo run: the MoveTo point, plus the closing copy for polygons.
  const extraPoints = type === GeomType.LineString ? 1 : type === GeomType.Polygon ? 2 : 0;

  const paths: A[] = [];
  const s: DecodeState<A> = {
    x: 0,
    y: 0,
    command: CMD_MOVE_TO,
    remaining: 0,
    hint: 0,
    path: kind.create(2),
    size: 0,
    first: true,
  };

  while (!commands.done) {
    if (s.remaining === 0) {
      const raw = commands.next();
      s.command = raw & 0x7;
      s.remaining = raw >>> 3;
      if (s.command !== CMD_MOVE_TO && s.command !== CMD_LINE_TO && s.command !== CMD_CLOSE_PATH) {
        throw new UnknownCommandError(s.command);
      }
      if (s.remaining === 0) continue;
      s.hint = reservationHint(s.remaining, maxReservedPoints);
    }

    if (s.command === CMD_CLOSE_PATH) {
      // A ring closes once; any larger count is ignored.
      s.remaining = 0;
      if (s.size > 0) {
        ensureCapacity(s, kind, s.size / 2 + 1);
        s.path[s.size] = s.path[0];
        s.path[s.size + 1] = s.path[1];
        s.size += 2;
      }
      continue;
    }

    // The declared count may exceed what the stream holds; stop at the end.
    if (commands.done) break;
    s.remaining--;

    if (s.command === CMD_MOVE_TO && s.size > 0) {
      paths.push(shrink(s.path, s.size, kind));
      s.path = kind.create(2);
      s.size = 0;
      s.first = true;
    }

    if (s.first && !isPoint && s.command === CMD_LINE_TO) {
      ensureCapacity(s, kind, s.hint + extraPoints);
      s.first = false;
    }

    s.x += unzigzag(commands.next());
    if (commands.done) {
      throw new MalformedGeometryError('geometry stream ends between the x and y of a point');
    }
    s.y += unzigzag(commands.next());

    const px = scaleCoordinate(s.x, factor);
    const py = scaleCoordinate(s.y, factor);
    if (!(px >= kind.min && px <= kind.max && py >= kind.min && py <= kind.max)) {
      throw new CoordinateOutOfRangeError(px, py, kind.name);
    }

    ensureCapacity(s, kind, s.size / 2 + 1);
    s.path[s.size] = px;
    s.path[s.size + 1] = py;
    s.size += 2;
  }

  if (s.size > 0) paths.push(shrink(s.path, s.size, kind));
  return paths;
}

// ─── Helpers ────────────────────────────────────────────────────────────────

/**
 * Make room for at least `points` points in the current path, doubling the
 * existing capacity when that is larger.
 */
function ensureCapacity<A extends CoordinateArray>(
  s: DecodeState<A>,
  kind: CoordinateKind<A>,
  points: number,
): void {
  const needed = points * 2;
  if (needed <= s.path.length) return;
  const next = kind.create(Math.max(needed, s.path.length * 2));
  next.set(s.path.subarray(0, s.size));
  s.path = next;
}

/** Return `path` trimmed to `size` coordinates, copying only if it is oversized. */
function shrink<A extends CoordinateArray>(path: A, size: number, kind: CoordinateKind<A>): A {
  if (path.length === size) return path;
  const exact = kind.create(size);
  exact.set(path.subarray(0, size));
  return exact;
}
