import { performance } from "node:perf_hooks";
import {
  CaptureError,
  RenderFailureError,
  ResourceExhaustionError,
  isAllocationFailure,
} from "../models/errors";
import type { CameraDescriptor, Matrix4 } from "../models/projection";
import { isWellFormedSurface, type RgbaSurface } from "../models/surface";
import { TileGrid } from "../models/tileGrid";
import { logger as defaultLogger, type Logger } from "../utils/logger";
import { metrics as defaultMetrics, type Metrics } from "../utils/metrics";
import { throwIfAborted } from "../utils/promise";
import {
  projectionForTile,
  storageRow,
  type GridGeometry,
  type PlannedTile,
} from "./gridPlanner";
import { sharpPngCodec, type PngCodec } from "./pngCodec";
import { resampleSurface } from "./surfaceResampler";

export type RgbaColor = readonly [r: number, g: number, b: number, a: number];

export const TRANSPARENT: RgbaColor = [0, 0, 0, 0];

export interface TileRenderRequest {
  tile: PlannedTile;
  projection: Matrix4;
  /** Surface size to produce, already multiplied by the supersample factor. */
  width: number;
  height: number;
  /**
   * Set when the background must stay transparent: clear to this color and
   * skip any sky or environment pass. Absent means the normal background.
   */
  clearColor?: RgbaColor;
}

export interface TileRenderer {
  render(request: TileRenderRequest): Promise<RgbaSurface>;
  downsample?(surface: RgbaSurface, width: number, height: number): Promise<RgbaSurface>;
  release?(surface: RgbaSurface): void;
}

export interface CaptureTilesOptions {
  camera: CameraDescriptor;
  geometry: GridGeometry;
  transparentBackground: boolean;
  compressionLevel: number;
  codec?: PngCodec;
  signal?: AbortSignal;
  onProgress?: (progress: number) => void;
  logger?: Logger;
  metrics?: Metrics;
}

const wrapRenderFailure = (
  cause: unknown,
  action: string,
  width: number,
  height: number,
): CaptureError => {
  if (cause instanceof CaptureError) {
    return cause;
  }

  if (isAllocationFailure(cause)) {
    return new ResourceExhaustionError(
      `Could not allocate a ${width}x${height} surface to ${action}; retry with a smaller tile side`,
      { cause },
    );
  }

  return new RenderFailureError(`Failed to ${action} ${width}x${height} tile`, {
    cause,
  });
};

const ensureSurface = (
  surface: RgbaSurface,
  width: number,
  height: number,
  action: string,
) => {
  if (!isWellFormedSurface(surface, width, height)) {
    throw new RenderFailureError(
      `Renderer returned a ${surface.width}x${surface.height} surface with ${surface.data.byteLength} bytes to ${action}, expected ${width}x${height} RGBA`,
    );
  }
};

/**
 * Renders, downsamples and encodes every planned tile, one at a time, into a
 * grid whose row 0 is the top of the final image.
 */
export const captureTiles = async (
  renderer: TileRenderer,
  options: CaptureTilesOptions,
): Promise<TileGrid> => {
  const {
    camera,
    geometry,
    transparentBackground,
    compressionLevel,
    codec = sharpPngCodec,
    signal,
    onProgress,
    logger = defaultLogger,
    metrics = defaultMetrics,
  } = options;

  const grid = new TileGrid(
    geometry.cols,
    geometry.rows,
    geometry.finalWidth,
    geometry.finalHeight,
  );
  const totalTiles = geometry.tiles.length;
  const factor = geometry.supersample;
  const downsample = (surface: RgbaSurface, width: number, height: number) =>
    renderer.downsample
      ? renderer.downsample(surface, width, height)
      : resampleSurface(surface, width, height);

  let tilesDone = 0;

  for (const tile of geometry.tiles) {
    throwIfAborted(signal, "tiling");

    const renderWidth = tile.width * factor;
    const renderHeight = tile.height * factor;
    const request: TileRenderRequest = {
      tile,
      projection: projectionForTile(camera, tile, geometry.targetAspect),
      width: renderWidth,
      height: renderHeight,
      ...(transparentBackground ? { clearColor: TRANSPARENT } : {}),
    };

    const startedAt = performance.now();
    const surfaces: RgbaSurface[] = [];
    let png: Buffer;

    try {
      let surface: RgbaSurface;
      try {
        surface = await renderer.render(request);
      } catch (cause) {
        throw wrapRenderFailure(cause, "render", renderWidth, renderHeight);
      }
      surfaces.push(surface);
      ensureSurface(surface, renderWidth, renderHeight, "render");
      throwIfAborted(signal, "tiling");

      if (factor > 1) {
        try {
          surface = await downsample(surface, tile.width, tile.height);
        } catch (cause) {
          throw wrapRenderFailure(cause, "downsample", tile.width, tile.height);
        }
        surfaces.push(surface);
        ensureSurface(surface, tile.width, tile.height, "downsample");
        throwIfAborted(signal, "tiling");
      }

      png = await codec.encode(surface, compressionLevel);
    } finally {
      for (const surface of new Set(surfaces)) {
        renderer.release?.(surface);
      }
    }

    grid.setTile(
      tile.tileX,
      storageRow(geometry, tile.tileY),
      tile.width,
      tile.height,
      png,
    );

    tilesDone += 1;
    const durationMs = performance.now() - startedAt;
    metrics.timer("capture.tile.duration", durationMs, {
      tileX: tile.tileX,
      tileY: tile.tileY,
      bytes: png.byteLength,
    });
    logger.debug("capture.tile_done", {
      tileX: tile.tileX,
      tileY: tile.tileY,
      width: tile.width,
      height: tile.height,
      tilesDone,
      totalTiles,
    });

    onProgress?.(tilesDone / totalTiles);
    throwIfAborted(signal, "tiling");
  }

  return grid;
};
