import { describe, it, expect } from 'vitest';
import { Tile } from '../src/tile.js';
import { Layer } from '../src/mvt/layer.js';
import {
  MissingRequiredFieldError,
  NotFoundError,
  PrimitiveReadError,
  isDecodeError,
} from '../src/errors.js';
import { encodeTile, layer, moveTo } from './helpers/mvt-builder.js';

function roadsAndWater(): Uint8Array {
  return encodeTile([
    layer('roads', {
      keys: ['class'],
      values: [{ type: 'string', value: 'primary' }],
      features: [{ id: 1, type: 1, tags: [0, 0], geometry: moveTo([1, 1]) }],
    }),
    layer('water', { extent: 512 }),
  ]);
}

describe('Tile.parse', () => {
  it('should list layer names in wire order', () => {
    const tile = Tile.parse(roadsAndWater());
    expect(tile.layerNames()).toEqual(['roads', 'water']);
    expect(tile.layerCount).toBe(2);
  });

  it('should answer hasLayer', () => {
    const tile = Tile.parse(roadsAndWater());
    expect(tile.hasLayer('roads')).toBe(true);
    expect(tile.hasLayer('Roads')).toBe(false);
  });

  it('should parse an empty tile', () => {
    const tile = Tile.parse(new Uint8Array(0));
    expect(tile.layerNames()).toEqual([]);
    expect(tile.layerCount).toBe(0);
  });

  it('should let the last layer with a name win and keep its first position', () => {
    const tile = Tile.parse(encodeTile([
      layer('a', { extent: 512 }),
      layer('b'),
      layer('a', { extent: 1024 }),
    ]));
    expect(tile.layerNames()).toEqual(['a', 'b']);
    expect(tile.layerCount).toBe(2);
    expect(tile.getLayer('a').getExtent()).toBe(1024);
  });

  it('should reject a layer without a name', () => {
    let caught: unknown;
    try {
      Tile.parse(encodeTile([layer('ok'), { version: 2, extent: 4096 }]));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MissingRequiredFieldError);
    expect(caught instanceof MissingRequiredFieldError && caught.fields).toEqual(['name']);
  });

  it('should skip unknown top-level fields', () => {
    const body = roadsAndWater();
    const bytes = new Uint8Array(body.length + 2);
    bytes.set([0x08, 0x01]);
    bytes.set(body, 2);
    expect(Tile.parse(bytes).layerNames()).toEqual(['roads', 'water']);
  });

  it('should reject a truncated layer field', () => {
    // field 3, LEN, declared length 16, one payload byte
    expect(() => Tile.parse(new Uint8Array([0x1a, 0x10, 0x0a]))).toThrow(PrimitiveReadError);
    expect(() => Tile.parse(new Uint8Array([0x1a, 0x10, 0x0a])))
      .toThrow('Tile.layers is truncated (18 > 3)');
  });

  it('should read a tile from a subarray with a byte offset', () => {
    const body = roadsAndWater();
    const padded = new Uint8Array(body.length + 5);
    padded.set(body, 5);
    const tile = Tile.parse(padded.subarray(5));
    expect(tile.layerNames()).toEqual(['roads', 'water']);
    expect(tile.getLayer('roads').getFeature(0).getValue('class'))
      .toEqual({ type: 'string', value: 'primary' });
  });

  it('should reject invalid options', () => {
    expect(() => Tile.parse(roadsAndWater(), { maxReservedPoints: 0 })).toThrow(RangeError);
    expect(() => Tile.parse(roadsAndWater(), { maxReservedPoints: 1.5 }))
      .toThrow('maxReservedPoints must be a positive integer, got 1.5');
  });
});

describe('Tile.getLayer', () => {
  it('should parse the named layer', () => {
    const tile = Tile.parse(roadsAndWater());
    const water = tile.getLayer('water');
    expect(water.getName()).toBe('water');
    expect(water.getExtent()).toBe(512);
    expect(tile.getLayer('roads').featureCount()).toBe(1);
  });

  it('should parse a fresh layer on every call', () => {
    const tile = Tile.parse(roadsAndWater());
    expect(tile.getLayer('roads')).not.toBe(tile.getLayer('roads'));
  });

  it('should throw NotFoundError for an unknown name', () => {
    const tile = Tile.parse(roadsAndWater());
    let caught: unknown;
    try {
      tile.getLayer('buildings');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(NotFoundError);
    expect(isDecodeError(caught) && caught.kind).toBe('NotFound');
    expect(caught instanceof Error && caught.message).toBe('layer "buildings" not found');
  });

  it('should keep a malformed layer from affecting its siblings', () => {
    const tile = Tile.parse(encodeTile([
      { name: 'broken', extent: 4096 },
      layer('good'),
    ]));
    expect(tile.layerNames()).toEqual(['broken', 'good']);
    expect(() => tile.getLayer('broken')).toThrow(MissingRequiredFieldError);
    expect(tile.getLayer('good').getName()).toBe('good');
  });

  it('should pass its options on to features', () => {
    const warnings: string[] = [];
    const tile = Tile.parse(encodeTile([
      layer('dup', {
        keys: ['k', 'k'],
        values: [{ type: 'bool', value: true }],
        features: [{ tags: [1, 0] }],
      }),
    ]), { onWarning: (m) => warnings.push(m) });

    expect(tile.getLayer('dup').getFeature(0).getValue('k')).toEqual({ type: 'bool', value: true });
    expect(warnings).toEqual(['duplicate keys with different tag ids (key "k")']);
  });
});

describe('Tile.getLayerBytes', () => {
  it('should return a view sharing the tile buffer', () => {
    const bytes = roadsAndWater();
    const tile = Tile.parse(bytes);
    const raw = tile.getLayerBytes('water');
    expect(raw.buffer).toBe(bytes.buffer);
  });

  it('should round-trip through Layer.fromBytes', () => {
    const tile = Tile.parse(roadsAndWater());
    const roads = Layer.fromBytes(tile.getLayerBytes('roads'));
    expect(roads.getName()).toBe('roads');
    expect(roads.getFeature(0).getId()).toBe(1);
  });

  it('should throw NotFoundError for an unknown name', () => {
    expect(() => Tile.parse(roadsAndWater()).getLayerBytes('nope')).toThrow(NotFoundError);
  });
});
