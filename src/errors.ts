/**
 * @module errors
 *
 * Error taxonomy for tile decoding.
 *
 * Every failure raised by the decoder is a {@link DecodeError} subclass with
 * a literal `kind` discriminant, so callers can `switch` on it after
 * narrowing with {@link isDecodeError}:
 *
 * | Class | `kind` | Raised when |
 * |-------|--------|-------------|
 * | {@link MissingRequiredFieldError} | `MissingRequiredField` | A layer lacks `name`, `version` or `extent` |
 * | {@link MalformedTagStreamError} | `MalformedTagStream` | A feature's tag stream has an odd length |
 * | {@link OutOfRangeReferenceError} | `OutOfRangeReference` | A tag points past the key or value dictionary |
 * | {@link UnknownCommandError} | `UnknownCommand` | A geometry command id is not 1, 2 or 7 |
 * | {@link CoordinateOutOfRangeError} | `CoordinateOutOfRange` | A scaled point does not fit the coordinate type |
 * | {@link MalformedGeometryError} | `MalformedGeometry` | The geometry stream ends between `dx` and `dy` |
 * | {@link NotFoundError} | `NotFound` | Unknown layer name or feature index |
 * | {@link PrimitiveReadError} | `PrimitiveReadError` | Malformed varint, truncated field, wire-type mismatch |
 *
 * Errors are scoped to the unit being parsed: a bad layer or feature throws
 * from the call that parses it and leaves its siblings readable.
 */

export type DecodeErrorKind =
  | 'MissingRequiredField'
  | 'MalformedTagStream'
  | 'OutOfRangeReference'
  | 'UnknownCommand'
  | 'CoordinateOutOfRange'
  | 'MalformedGeometry'
  | 'NotFound'
  | 'PrimitiveReadError';

/** Layer fields that must be present, in the order they are reported. */
export type RequiredLayerField = 'version' | 'extent' | 'name';

/** Base class of every error thrown while decoding a tile. */
export abstract class DecodeError extends Error {
  abstract readonly kind: DecodeErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * A layer message is missing one or more required fields.
 *
 * `fields` lists every absent field (version, extent, name order), never
 * just the first one found.
 */
export class MissingRequiredFieldError extends DecodeError {
  readonly kind = 'MissingRequiredField';

  constructor(readonly fields: readonly RequiredLayerField[]) {
    super(`missing required field: ${fields.join(', ')}`);
  }
}

export class MalformedTagStreamError extends DecodeError {
  readonly kind = 'MalformedTagStream';

  constructor(readonly length: number) {
    super(`uneven number of feature tag ids (${length})`);
  }
}

/** A feature tag references a key or value index beyond its dictionary. */
export class OutOfRangeReferenceError extends DecodeError {
  readonly kind = 'OutOfRangeReference';

  constructor(
    readonly dictionary: 'keys' | 'values',
    readonly index: number,
    readonly size: number,
  ) {
    super(`feature referenced out of range ${dictionary === 'keys' ? 'key' : 'value'} ${index} (dictionary size ${size})`);
  }
}

export class UnknownCommandError extends DecodeError {
  readonly kind = 'UnknownCommand';

  constructor(readonly command: number) {
    super(`unknown geometry command ${command}`);
  }
}

/**
 * A scaled coordinate does not fit the requested {@link CoordinateKind}.
 *
 * Values are never clamped; `x` and `y` are the offending scaled values.
 */
export class CoordinateOutOfRangeError extends DecodeError {
  readonly kind = 'CoordinateOutOfRange';

  constructor(
    readonly x: number,
    readonly y: number,
    readonly coordinateType: string,
  ) {
    super(`point (${x}, ${y}) outside valid range of ${coordinateType}`);
  }
}

export class MalformedGeometryError extends DecodeError {
  readonly kind = 'MalformedGeometry';
}

/** A layer name or feature index does not exist. */
export class NotFoundError extends DecodeError {
  readonly kind = 'NotFound';

  constructor(
    readonly what: 'layer' | 'feature',
    readonly key: string | number,
  ) {
    super(what === 'layer' ? `layer "${key}" not found` : `feature ${key} not found`);
  }
}

/**
 * The protobuf layer failed: a malformed varint, a length-delimited field
 * running past its message, or a field with an unexpected wire type.
 *
 * Errors thrown by the `pbf` reader itself are attached as `cause`.
 */
export class PrimitiveReadError extends DecodeError {
  readonly kind = 'PrimitiveReadError';
}

/**
 * Type guard for errors raised by this package.
 *
 * @example
 * ```typescript
 * try {
 *   tile.getLayer('roads');
 * } catch (err) {
 *   if (isDecodeError(err) && err.kind === 'NotFound') return null;
 *   throw err;
 * }
 * ```
 */
export function isDecodeError(err: unknown): err is DecodeError {
  return err instanceof DecodeError;
}
