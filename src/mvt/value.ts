/**
 * @module mvt/value
 *
 * Decoding of `Tile.Value` messages from a layer's value dictionary.
 *
 * MVT stores values in a typed oneof: string, float, double, int64, uint64,
 * sint64, or bool. We collapse float/double into `double` and sint64 into
 * `int64`. A message that sets none of them decodes as `null`.
 *
 * When a message sets several of the oneof fields, the last one on the wire
 * wins, matching how repeated scalar fields fold in protobuf.
 */

import type { ProtoReader } from '../pbf/reader.js';
import type { ByteView, Int64 } from '../types.js';

const VALUE_STRING = 1;
const VALUE_FLOAT = 2;
const VALUE_DOUBLE = 3;
const VALUE_INT = 4;
const VALUE_UINT = 5;
const VALUE_SINT = 6;
const VALUE_BOOL = 7;

/**
 * A decoded MVT property value.
 *
 * 64-bit integers are {@link Int64}: a `number` when exact, else a `bigint`.
 */
export type Value =
  | { readonly type: 'string'; readonly value: string }
  | { readonly type: 'double'; readonly value: number }
  | { readonly type: 'int64'; readonly value: Int64 }
  | { readonly type: 'uint64'; readonly value: Int64 }
  | { readonly type: 'bool'; readonly value: boolean }
  | { readonly type: 'null' };

export type ValueType = Value['type'];

/** The shared `null` value. */
export const NULL_VALUE: Value = Object.freeze({ type: 'null' });

/**
 * Decode one value message.
 *
 * @param reader - Reader over the tile buffer.
 * @param view - The `Tile.Value` message bytes.
 */
export function decodeValue(reader: ProtoReader, view: ByteView): Value {
  let value = NULL_VALUE;

  reader.fields(view, (field) => {
    switch (field) {
      case VALUE_STRING:
        value = { type: 'string', value: reader.string('Value.string_value') };
        break;
      case VALUE_FLOAT:
        value = { type: 'double', value: reader.float('Value.float_value') };
        break;
      case VALUE_DOUBLE:
        value = { type: 'double', value: reader.double('Value.double_value') };
        break;
      case VALUE_INT:
        value = { type: 'int64', value: reader.int64('Value.int_value') };
        break;
      case VALUE_UINT:
        value = { type: 'uint64', value: reader.uint64('Value.uint_value') };
        break;
      case VALUE_SINT:
        value = { type: 'int64', value: reader.sint64('Value.sint_value') };
        break;
      case VALUE_BOOL:
        value = { type: 'bool', value: reader.bool('Value.bool_value') };
        break;
    }
  });

  return value;
}

/**
 * Unwrap a {@link Value} into a plain JS value (`null` for the null variant).
 *
 * @example
 * ```typescript
 * toPlainValue({ type: 'int64', value: -3 }); // -3
 * toPlainValue(NULL_VALUE);                   // null
 * ```
 */
export function toPlainValue(value: Value): string | number | bigint | boolean | null {
  switch (value.type) {
    case 'string':
    case 'double':
    case 'int64':
    case 'uint64':
    case 'bool':
      return value.value;
    case 'null':
      return null;
  }
}
