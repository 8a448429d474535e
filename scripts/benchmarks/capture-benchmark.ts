#!/usr/bin/env tsx
/**
 * capture-benchmark.ts
 *
 * Usage: npm run benchmark:capture -- [iterations] [width] [height]
 * Defaults: iterations=3, width=4096, height=2304
 *
 * Captures through a synthetic in-process renderer so tiling, encoding and
 * the streaming merge can be timed without a GPU.
 */

import { performance } from 'node:perf_hooks';
import { CaptureContext } from '../../src/services/captureContext';
import { loadTestConfig, quietLogger, quietMetrics } from '../../src/test/setup';
import { SyntheticRenderer } from '../../src/test/utils/syntheticRenderer';

const iterations = Number(process.argv[2] ?? 3);
const width = Number(process.argv[3] ?? 4096);
const height = Number(process.argv[4] ?? 2304);

const runIteration = async () => {
  const renderer = new SyntheticRenderer({ finalWidth: width, finalHeight: height, orthographicSize: 5 });
  const context = new CaptureContext({
    renderer,
    config: loadTestConfig({ MAX_TILE_SIDE: '1024' }),
    logger: quietLogger,
    metrics: quietMetrics,
  });

  const startedAt = performance.now();
  const result = await context.capture({
    camera: { kind: 'orthographic', orthographicSize: 5, near: 0.1, far: 100 },
    width,
    height,
  });
  const wallDuration = performance.now() - startedAt;

  return {
    wallDuration,
    tilingDuration: result.metadata.durations.tilingMs,
    mergingDuration: result.metadata.durations.mergingMs,
    bytes: result.metadata.output.bytes,
    tiles: result.metadata.grid.cols * result.metadata.grid.rows,
    peakLiveSurfaces: renderer.peakLive,
  };
};

const main = async () => {
  const runs = [];

  for (let iteration = 0; iteration < iterations; iteration += 1) {
    const metrics = await runIteration();
    runs.push(metrics);
    console.log(
      `run ${iteration + 1}: wall=${metrics.wallDuration.toFixed(2)}ms, tiling=${metrics.tilingDuration.toFixed(2)}ms, merging=${metrics.mergingDuration.toFixed(2)}ms, tiles=${metrics.tiles}, bytes=${metrics.bytes}, peakLive=${metrics.peakLiveSurfaces}`,
    );
  }

  const average = runs.reduce((acc, value) => acc + value.wallDuration, 0) / runs.length;
  console.log(`\naverage wall duration: ${average.toFixed(2)}ms over ${runs.length} runs (${width}x${height})`);
};

main().catch((error) => {
  console.error('Benchmark failed', error);
  process.exitCode = 1;
});
