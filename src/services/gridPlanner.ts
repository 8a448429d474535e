import { InvalidDimensionsError } from "../models/errors";
import {
  frustumMatrix,
  lerp,
  orthographicMatrix,
  type CameraDescriptor,
  type Matrix4,
} from "../models/projection";

/** No tile is ever planned smaller than this, whatever the device reports. */
export const MIN_TILE_SIDE = 256;

export interface PlanOptions {
  finalWidth: number;
  finalHeight: number;
  maxTileSide: number;
  deviceMaxSurfaceSide: number;
  supersample: number;
}

/** Tile bounds mapped into the full view's [-1, 1] device range. */
export interface NdcBounds {
  left: number;
  right: number;
  bottom: number;
  top: number;
}

export interface PlannedTile {
  tileX: number;
  tileY: number;
  /** Pixel offset from the left edge of the final image. */
  x0: number;
  /** Pixel offset from the bottom edge, matching projection space. */
  y0: number;
  width: number;
  height: number;
  ndc: NdcBounds;
}

export interface GridGeometry {
  finalWidth: number;
  finalHeight: number;
  tileSide: number;
  cols: number;
  rows: number;
  supersample: number;
  targetAspect: number;
  /** Row-major, bottom tile-row first. */
  tiles: PlannedTile[];
}

const isPositiveInteger = (value: number) =>
  Number.isInteger(value) && value > 0;

const clamp = (value: number, min: number, max: number) =>
  Math.min(Math.max(value, min), max);

export const planGrid = ({
  finalWidth,
  finalHeight,
  maxTileSide,
  deviceMaxSurfaceSide,
  supersample,
}: PlanOptions): GridGeometry => {
  if (!isPositiveInteger(finalWidth) || !isPositiveInteger(finalHeight)) {
    throw new InvalidDimensionsError(finalWidth, finalHeight);
  }

  const factor = Math.max(1, Math.floor(supersample));
  // The supersampled surface of one tile must still fit on the device.
  const surfaceCap = Math.max(MIN_TILE_SIDE, Math.floor(deviceMaxSurfaceSide));
  const tileCap = Math.max(MIN_TILE_SIDE, Math.floor(surfaceCap / factor));
  const tileSide = clamp(Math.floor(maxTileSide), MIN_TILE_SIDE, tileCap);

  const cols = Math.ceil(finalWidth / tileSide);
  const rows = Math.ceil(finalHeight / tileSide);
  const targetAspect = finalWidth / finalHeight;

  const tiles: PlannedTile[] = [];

  for (let tileY = 0; tileY < rows; tileY += 1) {
    for (let tileX = 0; tileX < cols; tileX += 1) {
      const x0 = tileX * tileSide;
      const y0 = tileY * tileSide;
      const width = Math.min(tileSide, finalWidth - x0);
      const height = Math.min(tileSide, finalHeight - y0);

      const u0 = x0 / finalWidth;
      const v0 = y0 / finalHeight;
      const u1 = (x0 + width) / finalWidth;
      const v1 = (y0 + height) / finalHeight;

      tiles.push({
        tileX,
        tileY,
        x0,
        y0,
        width,
        height,
        ndc: {
          left: u0 * 2 - 1,
          right: u1 * 2 - 1,
          bottom: v0 * 2 - 1,
          top: v1 * 2 - 1,
        },
      });
    }
  }

  return {
    finalWidth,
    finalHeight,
    tileSide,
    cols,
    rows,
    supersample: factor,
    targetAspect,
    tiles,
  };
};

const toUnit = (ndc: number) => (ndc + 1) * 0.5;

/**
 * Off-center projection that renders exactly `tile`'s part of a view whose
 * aspect is `targetAspect` (the final image's, never the camera's own).
 */
export const projectionForTile = (
  camera: CameraDescriptor,
  tile: Pick<PlannedTile, "ndc">,
  targetAspect: number,
): Matrix4 => {
  const { ndc } = tile;
  const { near, far } = camera;

  let halfWidth: number;
  let halfHeight: number;

  if (camera.kind === "orthographic") {
    halfHeight = camera.orthographicSize;
    halfWidth = halfHeight * targetAspect;
  } else {
    halfHeight = Math.tan((camera.fieldOfView * Math.PI) / 360) * near;
    halfWidth = halfHeight * targetAspect;
  }

  const bounds = {
    left: lerp(-halfWidth, halfWidth, toUnit(ndc.left)),
    right: lerp(-halfWidth, halfWidth, toUnit(ndc.right)),
    bottom: lerp(-halfHeight, halfHeight, toUnit(ndc.bottom)),
    top: lerp(-halfHeight, halfHeight, toUnit(ndc.top)),
    near,
    far,
  };

  return camera.kind === "orthographic"
    ? orthographicMatrix(bounds)
    : frustumMatrix(bounds);
};

/** Row of the stored grid that holds planned tile-row `tileY`. */
export const storageRow = (geometry: Pick<GridGeometry, "rows">, tileY: number) =>
  geometry.rows - 1 - tileY;
