/**
 * @module options
 *
 * Decode configuration and option resolution.
 *
 * Option values cascade through three levels:
 *
 * 1. Per-call arguments (e.g. the `onWarning` argument of
 *    {@link Feature.getValue}): highest priority
 * 2. {@link DecodeOptions} given to {@link Tile.parse} or
 *    {@link Layer.fromBytes}
 * 3. {@link DEFAULT_DECODE_OPTIONS}: built-in fallbacks
 *
 * @example
 * ```typescript
 * const tile = Tile.parse(bytes, {
 *   maxReservedPoints: 4096,
 *   onWarning: (message) => warnings.push(message),
 * });
 * ```
 */

/**
 * Receives advisory notes raised by an operation that still succeeds,
 * such as a key lookup that matched duplicate dictionary keys.
 */
export type WarningSink = (message: string) => void;

/** Caller-facing decode options. Every field is optional. */
export interface DecodeOptions {
  /**
   * Upper bound on the number of points pre-allocated from a geometry
   * command's declared count. Streams longer than the bound still decode;
   * paths grow past it on demand. @defaultValue 65536 (≈ 1 MiB at 16 bytes/point)
   */
  maxReservedPoints?: number;
  /** Default sink for advisory warnings. @defaultValue none */
  onWarning?: WarningSink;
}

/** Options with every default applied. */
export interface ResolvedDecodeOptions {
  maxReservedPoints: number;
  onWarning: WarningSink | undefined;
}

/** One MiB of reservation, assuming 16 bytes per decoded point. */
export const MAX_RESERVED_POINTS = (1 << 20) / 16;

/**
 * Built-in default values for all decode options.
 */
export const DEFAULT_DECODE_OPTIONS: ResolvedDecodeOptions = {
  maxReservedPoints: MAX_RESERVED_POINTS,
  onWarning: undefined,
};

/**
 * Resolve effective decode options: caller options → built-in defaults.
 *
 * @throws {RangeError} If `maxReservedPoints` is not a positive integer.
 *
 * @example
 * ```typescript
 * resolveOptions({ maxReservedPoints: 1024 });
 * // → { maxReservedPoints: 1024, onWarning: undefined }
 * ```
 */
export function resolveOptions(options?: DecodeOptions): ResolvedDecodeOptions {
  const maxReservedPoints = options?.maxReservedPoints ?? DEFAULT_DECODE_OPTIONS.maxReservedPoints;
  if (!Number.isInteger(maxReservedPoints) || maxReservedPoints < 1) {
    throw new RangeError(`maxReservedPoints must be a positive integer, got ${maxReservedPoints}`);
  }
  return {
    maxReservedPoints,
    onWarning: options?.onWarning ?? DEFAULT_DECODE_OPTIONS.onWarning,
  };
}
