/**
 * Performance benchmarks for lazy-mvt.
 *
 * Each suite measures one level of lazy decoding on synthetic tiles built
 * with the test encoder, reporting throughput in ops/sec.
 *
 * Run: npm run bench
 */

import { Tile } from '../src/tile.js';
import { INT16 } from '../src/mvt/geometry.js';
import {
  closePath,
  encodeTile,
  layer,
  lineTo,
  moveTo,
  type TestFeature,
  type TestLayer,
} from '../test/helpers/mvt-builder.js';

// ─── Helpers ────────────────────────────────────────────────────────────────

function bench(name: string, fn: () => void, iterations: number): void {
  // Warmup
  for (let i = 0; i < Math.min(iterations, 100); i++) fn();

  const start = performance.now();
  for (let i = 0; i < iterations; i++) fn();
  const elapsed = performance.now() - start;

  const opsPerSec = (iterations / elapsed) * 1000;
  const usPerOp = (elapsed / iterations) * 1000;

  console.log(
    `  ${name.padEnd(45)} ${fmt(opsPerSec, 0).padStart(12)} ops/s  ${fmt(usPerOp, 1).padStart(10)} µs/op`,
  );
}

function fmt(n: number, decimals: number): string {
  return n.toLocaleString('en-US', { maximumFractionDigits: decimals });
}

function randomDelta(span: number): [number, number] {
  return [
    Math.round((Math.random() - 0.5) * span),
    Math.round((Math.random() - 0.5) * span),
  ];
}

// ─── Synthetic data generators ──────────────────────────────────────────────

const PROPERTY_KEYS = ['name', 'class', 'rank', 'height', 'open'];

function generateLayer(name: string, features: TestFeature[]): TestLayer {
  return layer(name, {
    keys: PROPERTY_KEYS,
    values: [
      { type: 'string', value: 'feature' },
      { type: 'string', value: 'residential' },
      { type: 'uint', value: 7 },
      { type: 'double', value: 12.5 },
      { type: 'bool', value: true },
    ],
    features,
  });
}

/** Tag stream referencing every key with the value at the same index. */
function allTags(): number[] {
  return PROPERTY_KEYS.flatMap((_, i) => [i, i]);
}

function generatePoints(count: number): TestFeature[] {
  return Array.from({ length: count }, (_, i) => ({
    id: i,
    type: 1,
    tags: allTags(),
    geometry: moveTo([Math.floor(Math.random() * 4096), Math.floor(Math.random() * 4096)]),
  }));
}

function generateLines(count: number, pointsPerLine: number): TestFeature[] {
  return Array.from({ length: count }, (_, i) => {
    const deltas = Array.from({ length: pointsPerLine - 1 }, () => randomDelta(64));
    return {
      id: i,
      type: 2,
      tags: allTags(),
      geometry: [...moveTo([2048, 2048]), ...lineTo(...deltas)],
    };
  });
}

function generatePolygons(count: number, verticesPerRing: number): TestFeature[] {
  return Array.from({ length: count }, (_, i) => {
    const deltas = Array.from({ length: verticesPerRing - 1 }, () => randomDelta(32));
    return {
      id: i,
      type: 3,
      tags: allTags(),
      geometry: [...moveTo([1024, 1024]), ...lineTo(...deltas), ...closePath()],
    };
  });
}

// ─── Benchmark suites ───────────────────────────────────────────────────────

function benchTileParse() {
  console.log('\n── Tile.parse (layer names only) ──');

  for (const numLayers of [1, 10, 50]) {
    const layers = Array.from({ length: numLayers }, (_, i) => generateLayer(`layer-${i}`, generatePoints(100)));
    const bytes = encodeTile(layers);

    bench(`${numLayers} layers × 100 features`, () => {
      Tile.parse(bytes);
    }, 5000);
  }
}

function benchLayerParse() {
  console.log('\n── Tile.getLayer ──');

  for (const featureCount of [10, 100, 1000]) {
    const tile = Tile.parse(encodeTile([generateLayer('bench', generatePoints(featureCount))]));

    bench(`${featureCount}-feature layer`, () => {
      tile.getLayer('bench');
    }, 5000);
  }
}

function benchProperties() {
  console.log('\n── Feature properties ──');

  const tile = Tile.parse(encodeTile([generateLayer('bench', generatePoints(100))]));
  const feature = tile.getLayer('bench').getFeature(50);

  bench('getValue (first key)', () => feature.getValue('name'), 100000);
  bench('getValue (last key)', () => feature.getValue('open'), 100000);
  bench('getValue (missing key)', () => feature.getValue('missing'), 100000);
  bench('getProperties (5 keys)', () => feature.getProperties(), 50000);
}

function benchGeometry() {
  console.log('\n── Geometry decoding ──');

  for (const n of [10, 100, 1000]) {
    const tile = Tile.parse(encodeTile([generateLayer('bench', generateLines(1, n))]));
    const feature = tile.getLayer('bench').getFeature(0);

    bench(`${n}-point linestring → Int32Array`, () => feature.getGeometries(1), 10000);
    bench(`${n}-point linestring → Int16Array`, () => feature.getGeometries(0.125, INT16), 10000);
  }

  const polygons = Tile.parse(encodeTile([generateLayer('bench', generatePolygons(1, 50))]));
  const polygon = polygons.getLayer('bench').getFeature(0);
  bench('50-vertex polygon ring', () => polygon.getGeometries(1), 20000);
}

function benchFullDecode() {
  console.log('\n── Full decode (every layer, feature, property, geometry) ──');

  const bytes = encodeTile([
    generateLayer('points', generatePoints(200)),
    generateLayer('lines', generateLines(50, 30)),
    generateLayer('polygons', generatePolygons(50, 20)),
  ]);

  bench('300 mixed features', () => {
    const tile = Tile.parse(bytes);
    for (const name of tile.layerNames()) {
      const l = tile.getLayer(name);
      for (let i = 0; i < l.featureCount(); i++) {
        const f = l.getFeature(i);
        f.getProperties();
        f.getGeometries(1);
      }
    }
  }, 500);
}

// ─── Main ───────────────────────────────────────────────────────────────────

console.log('╔══════════════════════════════════════════════════════════════════════╗');
console.log('║  lazy-mvt Performance Benchmarks                                    ║');
console.log('╚══════════════════════════════════════════════════════════════════════╝');

benchTileParse();
benchLayerParse();
benchProperties();
benchGeometry();
benchFullDecode();

console.log('\nDone.');
