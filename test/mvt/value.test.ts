import { describe, it, expect } from 'vitest';
import Pbf from 'pbf';
import { Layer } from '../../src/mvt/layer.js';
import { NULL_VALUE, toPlainValue } from '../../src/mvt/value.js';
import { OutOfRangeReferenceError, PrimitiveReadError } from '../../src/errors.js';
import { encodeLayer, layer, varint64, zigzag64, type TestValue } from '../helpers/mvt-builder.js';

function dictionary(values: TestValue[]): Layer {
  return Layer.fromBytes(encodeLayer(layer('values', { values })));
}

describe('decodeValue', () => {
  it('should decode every oneof variant', () => {
    const l = dictionary([
      { type: 'string', value: 'hello' },
      { type: 'float', value: 1.5 },
      { type: 'double', value: 3.14 },
      { type: 'int', value: -7 },
      { type: 'uint', value: 42 },
      { type: 'sint', value: -3 },
      { type: 'bool', value: true },
    ]);

    expect(l.getDictionaryValue(0)).toEqual({ type: 'string', value: 'hello' });
    expect(l.getDictionaryValue(1)).toEqual({ type: 'double', value: 1.5 });
    expect(l.getDictionaryValue(2)).toEqual({ type: 'double', value: 3.14 });
    expect(l.getDictionaryValue(3)).toEqual({ type: 'int64', value: -7 });
    expect(l.getDictionaryValue(4)).toEqual({ type: 'uint64', value: 42 });
    expect(l.getDictionaryValue(5)).toEqual({ type: 'int64', value: -3 });
    expect(l.getDictionaryValue(6)).toEqual({ type: 'bool', value: true });
  });

  it('should promote floats to double with single precision', () => {
    const l = dictionary([{ type: 'float', value: 0.1 }]);
    expect(l.getDictionaryValue(0)).toEqual({ type: 'double', value: Math.fround(0.1) });
  });

  it('should decode non-ASCII strings', () => {
    const l = dictionary([{ type: 'string', value: 'Zürich Straße' }]);
    expect(l.getDictionaryValue(0)).toEqual({ type: 'string', value: 'Zürich Straße' });
  });

  it('should let the last field win when several are set', () => {
    const l = dictionary([
      [{ type: 'string', value: 'first' }, { type: 'uint', value: 5 }],
      [{ type: 'bool', value: false }, { type: 'string', value: 'last' }],
    ]);
    expect(l.getDictionaryValue(0)).toEqual({ type: 'uint64', value: 5 });
    expect(l.getDictionaryValue(1)).toEqual({ type: 'string', value: 'last' });
  });

  it('should decode an empty value message as null', () => {
    const l = dictionary([[]]);
    expect(l.getDictionaryValue(0)).toBe(NULL_VALUE);
  });

  it('should reject an index outside the dictionary', () => {
    const l = dictionary([{ type: 'bool', value: true }]);
    expect(() => l.getDictionaryValue(1)).toThrow(OutOfRangeReferenceError);
    expect(() => l.getDictionaryValue(-1)).toThrow(OutOfRangeReferenceError);
  });
});

describe('64-bit integer values', () => {
  const INT = 0x20;
  const UINT = 0x28;
  const SINT = 0x30;

  /** A layer whose dictionary holds the given raw value messages. */
  function rawDictionary(...messages: number[][]): Layer {
    const pbf = new Pbf();
    pbf.writeVarintField(15, 2);
    pbf.writeStringField(1, 'raw');
    pbf.writeVarintField(5, 4096);
    for (const message of messages) pbf.writeBytesField(4, new Uint8Array(message));
    return Layer.fromBytes(pbf.finish());
  }

  it('should keep values within the safe range as numbers', () => {
    const l = rawDictionary(
      [UINT, ...varint64(2n ** 53n - 1n)],
      [INT, ...varint64(-1n)],
      [SINT, ...varint64(zigzag64(-(2n ** 53n - 1n)))],
    );
    expect(l.getDictionaryValue(0)).toEqual({ type: 'uint64', value: 9007199254740991 });
    expect(l.getDictionaryValue(1)).toEqual({ type: 'int64', value: -1 });
    expect(l.getDictionaryValue(2)).toEqual({ type: 'int64', value: -9007199254740991 });
  });

  it('should decode unsigned values past 2^53 exactly', () => {
    const l = rawDictionary(
      [UINT, ...varint64(2n ** 53n + 1n)],
      [UINT, ...varint64(2n ** 64n - 1n)],
    );
    expect(l.getDictionaryValue(0)).toEqual({ type: 'uint64', value: 9007199254740993n });
    expect(l.getDictionaryValue(1)).toEqual({ type: 'uint64', value: 18446744073709551615n });
  });

  it('should decode the signed extremes exactly', () => {
    const l = rawDictionary(
      [INT, ...varint64(-(2n ** 63n))],
      [INT, ...varint64(2n ** 63n - 1n)],
      [SINT, ...varint64(zigzag64(-(2n ** 63n)))],
      [SINT, ...varint64(zigzag64(2n ** 53n + 1n))],
    );
    expect(l.getDictionaryValue(0)).toEqual({ type: 'int64', value: -9223372036854775808n });
    expect(l.getDictionaryValue(1)).toEqual({ type: 'int64', value: 9223372036854775807n });
    expect(l.getDictionaryValue(2)).toEqual({ type: 'int64', value: -9223372036854775808n });
    expect(l.getDictionaryValue(3)).toEqual({ type: 'int64', value: 9007199254740993n });
  });

  it('should reject a varint cut off by the end of its value', () => {
    const l = rawDictionary([UINT, 0xff]);
    expect(() => l.getDictionaryValue(0)).toThrow(PrimitiveReadError);
  });

  it('should reject a varint longer than ten bytes', () => {
    const l = rawDictionary([UINT, ...Array<number>(10).fill(0xff), 0x01]);
    expect(() => l.getDictionaryValue(0)).toThrow('varint is longer than 10 bytes');
  });
});

describe('toPlainValue', () => {
  it('should unwrap each variant', () => {
    expect(toPlainValue({ type: 'string', value: 'a' })).toBe('a');
    expect(toPlainValue({ type: 'double', value: 2.5 })).toBe(2.5);
    expect(toPlainValue({ type: 'int64', value: -1 })).toBe(-1);
    expect(toPlainValue({ type: 'uint64', value: 1 })).toBe(1);
    expect(toPlainValue({ type: 'uint64', value: 2n ** 64n - 1n })).toBe(18446744073709551615n);
    expect(toPlainValue({ type: 'bool', value: false })).toBe(false);
    expect(toPlainValue(NULL_VALUE)).toBeNull();
  });
});
