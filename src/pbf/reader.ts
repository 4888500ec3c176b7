/**
 * @module pbf/reader
 *
 * Protocol Buffer field reader for decoding MVT tiles.
 *
 * Wraps a single `pbf` cursor over the tile's backing buffer and adds the
 * checks the decoder relies on:
 *
 * | Check        | Failure                                                  |
 * |--------------|----------------------------------------------------------|
 * | Wire type    | A known field arrives with an unexpected wire type       |
 * | Bounds       | A field or packed varint runs past its enclosing message |
 * | Varint shape | `pbf` rejects a varint longer than 10 bytes              |
 *
 * Every failure surfaces as a {@link PrimitiveReadError}. Length-delimited
 * fields are returned as {@link ByteView | views} (absolute offsets), never
 * copied.
 *
 * | Wire Type | ID | Used For                                        |
 * |-----------|----|-------------------------------------------------|
 * | VARINT    |  0 | uint32, uint64, int64, sint64, bool, enum       |
 * | I64       |  1 | double                                          |
 * | LEN       |  2 | string, nested messages, packed repeated uint32 |
 * | I32       |  5 | float                                           |
 *
 * @see {@link https://protobuf.dev/programming-guides/encoding/ | Protobuf Encoding Guide}
 */

import Pbf from 'pbf';
import { DecodeError, PrimitiveReadError } from '../errors.js';
import type { ByteView, Int64 } from '../types.js';

export const WIRE_VARINT = 0;
export const WIRE_I64 = 1;
export const WIRE_LEN = 2;
export const WIRE_I32 = 5;

/**
 * Called once per field with its number and wire type. The callback must
 * consume at most the current field; unread fields are skipped.
 */
export type FieldVisitor = (field: number, wireType: number) => void;

/**
 * Shared field reader over one tile buffer.
 *
 * `pbf` reads fixed-width values through a `DataView` spanning its buffer's
 * whole `ArrayBuffer`, so the reader is built over the entire
 * `ArrayBuffer` and {@link root} records where the caller's bytes sit in it.
 *
 * The cursor position is global state: every scan starts by seeking to its
 * own view, and {@link PackedCursor} keeps its position privately, so reads
 * from different objects may interleave freely.
 *
 * @example
 * ```ts
 * const reader = new ProtoReader(bytes);
 * reader.fields(reader.root, (field) => {
 *   if (field === 1) name = reader.string('Layer.name');
 * });
 * ```
 */
export class ProtoReader {
  /** Every byte of the backing `ArrayBuffer`. Views index into this array. */
  readonly bytes: Uint8Array;
  /** View covering the bytes handed to the constructor. */
  readonly root: ByteView;

  private readonly pbf: Pbf;
  /** End of the message currently being scanned by {@link fields}. */
  private limit: number;

  constructor(bytes: Uint8Array) {
    this.bytes = new Uint8Array(bytes.buffer);
    this.root = { start: bytes.byteOffset, end: bytes.byteOffset + bytes.byteLength };
    this.pbf = new Pbf(this.bytes);
    this.limit = this.root.end;
  }

  // ─── Message scanning ───────────────────────────────────────────────

  /**
   * Visit every field of the message occupying `view`.
   *
   * Fields the visitor does not read are skipped. After each field the
   * cursor must still lie inside `view`; otherwise the message is truncated
   * and a {@link PrimitiveReadError} is thrown.
   */
  fields(view: ByteView, visit: FieldVisitor): void {
    const pbf = this.pbf;
    pbf.pos = view.start;
    try {
      while (pbf.pos < view.end) {
        this.limit = view.end;
        const tag = pbf.readVarint();
        const field = tag >>> 3;
        pbf.type = tag & 0x7;
        const startPos = pbf.pos;

        visit(field, pbf.type);
        if (pbf.pos === startPos) pbf.skip(tag);

        if (pbf.pos > view.end) {
          throw new PrimitiveReadError(
            `field ${field} runs past the end of its message (${pbf.pos} > ${view.end})`,
          );
        }
      }
    } catch (err) {
      throw asDecodeError(err);
    }
  }

  // ─── Field values ───────────────────────────────────────────────────
  //
  // Only valid inside a `fields` visitor: they read the current field and
  // rely on its wire type and enclosing message bounds.

  /** Read a length-delimited field as a view over its payload. */
  view(name: string): ByteView {
    this.expect(WIRE_LEN, name);
    const length = this.pbf.readVarint();
    const start = this.pbf.pos;
    const end = start + length;
    if (end > this.limit) {
      throw new PrimitiveReadError(`${name} is truncated (${end} > ${this.limit})`);
    }
    this.pbf.pos = end;
    return { start, end };
  }

  /** Read a length-delimited UTF-8 string field. */
  string(name: string): string {
    const lengthPos = this.pbf.pos;
    this.view(name);
    this.pbf.pos = lengthPos;
    return this.pbf.readString();
  }

  /** Read a varint field, truncated to 32 bits. */
  uint32(name: string): number {
    this.expect(WIRE_VARINT, name);
    return this.pbf.readVarint() >>> 0;
  }

  /**
   * Read a `uint64` varint. Values beyond `Number.MAX_SAFE_INTEGER` come
   * back as `bigint`.
   */
  uint64(name: string): Int64 {
    this.expect(WIRE_VARINT, name);
    return narrow(this.varint64());
  }

  /** Read a two's complement `int64` varint. */
  int64(name: string): Int64 {
    this.expect(WIRE_VARINT, name);
    return narrow(BigInt.asIntN(64, this.varint64()));
  }

  /** Read a zigzag-encoded `sint64` varint. */
  sint64(name: string): Int64 {
    this.expect(WIRE_VARINT, name);
    const raw = this.varint64();
    return narrow((raw >> 1n) ^ -(raw & 1n));
  }

  bool(name: string): boolean {
    this.expect(WIRE_VARINT, name);
    return this.pbf.readBoolean();
  }

  float(name: string): number {
    this.expect(WIRE_I32, name);
    return this.pbf.readFloat();
  }

  double(name: string): number {
    this.expect(WIRE_I64, name);
    return this.pbf.readDouble();
  }

  // ─── Packed repeated fields ─────────────────────────────────────────

  /** Open a cursor over a packed repeated uint32 payload. */
  packed(view: ByteView): PackedCursor {
    return new PackedCursor(this, view);
  }

  /**
   * Read one varint at `pos`, truncated to 32 bits.
   *
   * @returns The value; the position after it is left in {@link position}.
   */
  uint32At(pos: number): number {
    this.pbf.pos = pos;
    try {
      return this.pbf.readVarint() >>> 0;
    } catch (err) {
      throw asDecodeError(err);
    }
  }

  /** Current cursor position (absolute offset). */
  get position(): number {
    return this.pbf.pos;
  }

  /**
   * Count the varints in `view` without decoding them: each varint ends
   * with exactly one byte whose continuation bit is clear.
   */
  countVarints(view: ByteView): number {
    let count = 0;
    for (let i = view.start; i < view.end; i++) {
      if (this.bytes[i] < 0x80) count++;
    }
    return count;
  }

  /** Zero-copy subarray of the backing buffer covering `view`. */
  slice(view: ByteView): Uint8Array {
    return this.bytes.subarray(view.start, view.end);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  /**
   * Read a varint of up to 64 bits at the cursor. `pbf` decodes varints
   * into doubles, which drops bits past 2^53.
   */
  private varint64(): bigint {
    const bytes = this.bytes;
    let pos = this.pbf.pos;
    let value = 0n;
    for (let shift = 0n; shift < 70n; shift += 7n) {
      if (pos >= this.limit) {
        throw new PrimitiveReadError(`varint runs past the end of its message (${pos} >= ${this.limit})`);
      }
      const byte = bytes[pos++];
      value |= BigInt(byte & 0x7f) << shift;
      if (byte < 0x80) {
        this.pbf.pos = pos;
        return BigInt.asUintN(64, value);
      }
    }
    throw new PrimitiveReadError('varint is longer than 10 bytes');
  }

  private expect(wireType: number, name: string): void {
    if (this.pbf.type !== wireType) {
      throw new PrimitiveReadError(
        `${name}: expected wire type ${wireType}, got ${this.pbf.type}`,
      );
    }
  }
}

/**
 * Forward-only cursor over a packed repeated uint32 field.
 *
 * Keeps its own position so that other reads through the shared
 * {@link ProtoReader} (e.g. decoding a dictionary value between two tag
 * pairs) do not disturb it.
 */
export class PackedCursor {
  private pos: number;

  constructor(
    private readonly reader: ProtoReader,
    readonly view: ByteView,
  ) {
    this.pos = view.start;
  }

  /** `true` once every varint in the view has been read. */
  get done(): boolean {
    return this.pos >= this.view.end;
  }

  /** Total number of varints in the view, independent of the cursor. */
  count(): number {
    return this.reader.countVarints(this.view);
  }

  /** Read the next varint. Callers check {@link done} first. */
  next(): number {
    const value = this.reader.uint32At(this.pos);
    this.pos = this.reader.position;
    if (this.pos > this.view.end) {
      throw new PrimitiveReadError(
        `packed varint runs past the end of its field (${this.pos} > ${this.view.end})`,
      );
    }
    return value;
  }
}

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/** A 64-bit integer as a `number` when that is exact, otherwise as a `bigint`. */
function narrow(value: bigint): Int64 {
  return value >= -MAX_SAFE && value <= MAX_SAFE ? Number(value) : value;
}

/**
 * Pass decoder errors through; wrap anything else (`pbf`'s plain `Error`s,
 * a `RangeError` from reading past the buffer) as a {@link PrimitiveReadError}.
 */
function asDecodeError(err: unknown): DecodeError {
  if (err instanceof DecodeError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new PrimitiveReadError(message, { cause: err });
}
