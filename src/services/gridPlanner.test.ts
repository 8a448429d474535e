import assert from "node:assert/strict";
import test from "node:test";
import { InvalidDimensionsError } from "../models/errors";
import type { Matrix4 } from "../models/projection";
import { planGrid, projectionForTile, storageRow, type GridGeometry } from "./gridPlanner";

const DEVICE = 16_384;

const plan = (finalWidth: number, finalHeight: number, maxTileSide: number, supersample = 1) =>
  planGrid({ finalWidth, finalHeight, maxTileSide, deviceMaxSurfaceSide: DEVICE, supersample });

const assertClose = (actual: number, expected: number, message?: string) => {
  assert.ok(
    Math.abs(actual - expected) < 1e-9,
    message ?? `expected ${actual} to be close to ${expected}`,
  );
};

const tileAt = (geometry: GridGeometry, tileX: number, tileY: number) => {
  const tile = geometry.tiles.find((candidate) => candidate.tileX === tileX && candidate.tileY === tileY);
  assert.ok(tile, `tile (${tileX}, ${tileY}) should be planned`);
  return tile;
};

// Frustum side planes recovered from an OpenGL off-center frustum matrix.
const frustumSides = (m: Matrix4, near: number) => ({
  left: (near * (m[2] - 1)) / m[0],
  right: (near * (m[2] + 1)) / m[0],
  bottom: (near * (m[6] - 1)) / m[5],
  top: (near * (m[6] + 1)) / m[5],
});

const orthoSides = (m: Matrix4) => ({
  left: (-1 - m[3]) / m[0],
  right: (1 - m[3]) / m[0],
  bottom: (-1 - m[7]) / m[5],
  top: (1 - m[7]) / m[5],
});

test("planGrid splits 5000x3000 into 3x2 tiles of 2048 with truncated edges", () => {
  const geometry = plan(5000, 3000, 2048);

  assert.equal(geometry.tileSide, 2048);
  assert.equal(geometry.cols, 3);
  assert.equal(geometry.rows, 2);
  assert.equal(geometry.tiles.length, 6);
  assert.equal(tileAt(geometry, 2, 0).width, 904);
  assert.equal(tileAt(geometry, 0, 1).height, 952);
  assert.equal(tileAt(geometry, 2, 1).x0, 4096);
  assert.equal(tileAt(geometry, 2, 1).y0, 2048);
  assertClose(geometry.targetAspect, 5000 / 3000);
});

test("planGrid tiles always add up to the final size", () => {
  const cases: Array<[number, number, number]> = [
    [5000, 3000, 2048],
    [1, 1, 256],
    [257, 1023, 256],
    [4096, 4096, 1024],
    [131_072, 300, 3072],
  ];

  for (const [width, height, side] of cases) {
    const geometry = plan(width, height, side);

    for (let tileY = 0; tileY < geometry.rows; tileY += 1) {
      const rowWidth = geometry.tiles
        .filter((tile) => tile.tileY === tileY)
        .reduce((sum, tile) => sum + tile.width, 0);
      assert.equal(rowWidth, width, `row ${tileY} of ${width}x${height}`);
    }

    for (let tileX = 0; tileX < geometry.cols; tileX += 1) {
      const columnHeight = geometry.tiles
        .filter((tile) => tile.tileX === tileX)
        .reduce((sum, tile) => sum + tile.height, 0);
      assert.equal(columnHeight, height, `column ${tileX} of ${width}x${height}`);
    }

    for (const tile of geometry.tiles) {
      assert.ok(tile.width >= 1 && tile.width <= geometry.tileSide);
      assert.ok(tile.height >= 1 && tile.height <= geometry.tileSide);

      if (tile.tileX < geometry.cols - 1) {
        assert.equal(tile.width, geometry.tileSide);
      }

      if (tile.tileY < geometry.rows - 1) {
        assert.equal(tile.height, geometry.tileSide);
      }
    }
  }
});

test("planGrid lists tiles row-major from the bottom tile-row", () => {
  const geometry = plan(600, 520, 256);

  assert.deepEqual(
    geometry.tiles.slice(0, 4).map((tile) => [tile.tileX, tile.tileY]),
    [
      [0, 0],
      [1, 0],
      [2, 0],
      [0, 1],
    ],
  );
});

test("planGrid keeps the supersampled surface within the device limit", () => {
  const capped = planGrid({
    finalWidth: 10_000,
    finalHeight: 10_000,
    maxTileSide: 3072,
    deviceMaxSurfaceSide: 4096,
    supersample: 2,
  });
  assert.equal(capped.tileSide, 2048);
  assert.equal(capped.supersample, 2);

  const tiny = planGrid({
    finalWidth: 1000,
    finalHeight: 1000,
    maxTileSide: 3072,
    deviceMaxSurfaceSide: 300,
    supersample: 2,
  });
  assert.equal(tiny.tileSide, 256);
});

test("planGrid never plans tiles below 256 pixels", () => {
  assert.equal(plan(1000, 1000, 100).tileSide, 256);
  assert.equal(plan(1000, 1000, 100).cols, 4);
});

test("planGrid clamps the supersample factor to a positive integer", () => {
  assert.equal(plan(100, 100, 256, 0).supersample, 1);
  assert.equal(plan(100, 100, 256, -3).supersample, 1);
  assert.equal(plan(100, 100, 256, 2.7).supersample, 2);
});

test("planGrid rejects empty or fractional dimensions", () => {
  assert.throws(() => plan(0, 100, 256), InvalidDimensionsError);
  assert.throws(() => plan(100, -1, 256), InvalidDimensionsError);
  assert.throws(() => plan(100.5, 100, 256), (error: unknown) => {
    assert.ok(error instanceof InvalidDimensionsError);
    assert.equal(error.code, "capture.invalid_dimensions");
    return true;
  });
});

test("planGrid maps a single tile onto the full device range", () => {
  const [tile] = plan(300, 200, 512).tiles;

  assert.ok(tile);
  assert.deepEqual(tile.ndc, { left: -1, right: 1, bottom: -1, top: 1 });
});

test("projectionForTile builds the symmetric frustum for a full-frame tile", () => {
  const geometry = plan(400, 200, 512);
  const [tile] = geometry.tiles;
  assert.ok(tile);

  const m = projectionForTile(
    { kind: "perspective", fieldOfView: 90, near: 1, far: 100 },
    tile,
    geometry.targetAspect,
  );

  assertClose(m[0], 0.5);
  assertClose(m[2], 0);
  assertClose(m[5], 1);
  assertClose(m[6], 0);
  assertClose(m[10], -101 / 99);
  assertClose(m[11], -200 / 99);
  assert.equal(m[14], -1);
  assert.equal(m[15], 0);
});

test("projectionForTile uses the final aspect, not the camera's", () => {
  const wide = plan(800, 200, 1024);
  const [tile] = wide.tiles;
  assert.ok(tile);

  const sides = frustumSides(
    projectionForTile({ kind: "perspective", fieldOfView: 90, near: 2, far: 50 }, tile, wide.targetAspect),
    2,
  );

  assertClose(sides.top, 2);
  assertClose(sides.right, 8);
});

test("projectionForTile leaves no gap between neighbouring perspective tiles", () => {
  const geometry = plan(700, 600, 256);
  const camera = { kind: "perspective", fieldOfView: 60, near: 0.3, far: 1000 } as const;
  const sidesOf = (tileX: number, tileY: number) =>
    frustumSides(projectionForTile(camera, tileAt(geometry, tileX, tileY), geometry.targetAspect), camera.near);

  for (let tileY = 0; tileY < geometry.rows; tileY += 1) {
    for (let tileX = 0; tileX < geometry.cols - 1; tileX += 1) {
      assertClose(sidesOf(tileX, tileY).right, sidesOf(tileX + 1, tileY).left);
    }
  }

  for (let tileY = 0; tileY < geometry.rows - 1; tileY += 1) {
    assertClose(sidesOf(0, tileY).top, sidesOf(0, tileY + 1).bottom);
  }

  const halfHeight = Math.tan(Math.PI / 6) * camera.near;
  assertClose(sidesOf(0, 0).bottom, -halfHeight);
  assertClose(sidesOf(0, geometry.rows - 1).top, halfHeight);
  assertClose(sidesOf(geometry.cols - 1, 0).right, halfHeight * (700 / 600));
});

test("projectionForTile slices the orthographic volume by pixel bounds", () => {
  const geometry = plan(600, 300, 256);
  const camera = { kind: "orthographic", orthographicSize: 5, near: 0.1, far: 100 } as const;

  const first = orthoSides(projectionForTile(camera, tileAt(geometry, 0, 0), geometry.targetAspect));
  const last = orthoSides(projectionForTile(camera, tileAt(geometry, 2, 1), geometry.targetAspect));
  const m = projectionForTile(camera, tileAt(geometry, 0, 0), geometry.targetAspect);

  assertClose(first.left, -10);
  assertClose(first.right, -10 + (20 * 256) / 600);
  assertClose(first.bottom, -5);
  assertClose(first.top, -5 + (10 * 256) / 300);
  assertClose(last.right, 10);
  assertClose(last.top, 5);
  assertClose(m[10], -2 / 99.9);
  assert.equal(m[15], 1);
});

test("storageRow flips planned rows so row 0 is the top of the image", () => {
  const geometry = plan(600, 520, 256);

  assert.equal(storageRow(geometry, 0), 2);
  assert.equal(storageRow(geometry, 2), 0);
});
