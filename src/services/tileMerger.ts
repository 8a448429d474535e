import { performance } from "node:perf_hooks";
import {
  getMergeVerticalOverlap,
  getMergeYieldRows,
  getPngFilter,
  type PngFilter,
} from "../config";
import {
  ChannelMismatchError,
  TileGeometryMismatchError,
} from "../models/errors";
import { RGBA_CHANNELS } from "../models/surface";
import type { TileGrid } from "../models/tileGrid";
import { logger as defaultLogger, type Logger } from "../utils/logger";
import { metrics as defaultMetrics, type Metrics } from "../utils/metrics";
import { throwIfAborted, yieldControl } from "../utils/promise";
import { sharpPngCodec, type PngCodec, type ScanlineReader } from "./pngCodec";
import type { ChunkSink } from "./pngWriter";

export interface MergeOptions {
  compressionLevel: number;
  filter?: PngFilter;
  /** Rows each tile repeats from the tile-row above it. */
  verticalOverlap?: number;
  yieldEveryRows?: number;
  codec?: PngCodec;
  signal?: AbortSignal;
  onProgress?: (progress: number) => void;
  /** Drop each tile-row from the grid once it has been written. */
  releaseTiles?: boolean;
  /** Receives PNG chunks as they are produced, in addition to the result. */
  sink?: ChunkSink;
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * Rejects grids whose tiles could not tile the declared final size, before
 * anything is decoded or written.
 */
export const assertGridGeometry = (grid: TileGrid, verticalOverlap = 0) => {
  for (let tileY = 0; tileY < grid.rows; tileY += 1) {
    let rowWidth = 0;
    for (let tileX = 0; tileX < grid.cols; tileX += 1) {
      rowWidth += grid.requireTile(tileX, tileY).width;
    }

    if (rowWidth !== grid.finalWidth) {
      throw new TileGeometryMismatchError(
        `Tile-row ${tileY} is ${rowWidth}px wide but the final image is ${grid.finalWidth}px wide`,
      );
    }
  }

  const overlapRows = verticalOverlap * (grid.rows - 1);

  for (let tileX = 0; tileX < grid.cols; tileX += 1) {
    let columnHeight = 0;
    for (let tileY = 0; tileY < grid.rows; tileY += 1) {
      columnHeight += grid.requireTile(tileX, tileY).height;
    }

    if (columnHeight - overlapRows !== grid.finalHeight) {
      throw new TileGeometryMismatchError(
        `Tile-column ${tileX} covers ${columnHeight - overlapRows}px but the final image is ${grid.finalHeight}px tall`,
      );
    }
  }
};

const openTileRow = async (
  grid: TileGrid,
  tileY: number,
  codec: PngCodec,
  readers: ScanlineReader[],
) => {
  for (let tileX = 0; tileX < grid.cols; tileX += 1) {
    const tile = grid.requireTile(tileX, tileY);
    const reader = await codec.openReader(tile.pngBytes);
    readers.push(reader);

    if (reader.channels !== RGBA_CHANNELS) {
      throw new ChannelMismatchError(tileX, tileY, reader.channels, RGBA_CHANNELS);
    }

    if (reader.width !== tile.width || reader.height !== tile.height) {
      throw new TileGeometryMismatchError(
        `Tile (${tileX}, ${tileY}) decodes to ${reader.width}x${reader.height} but was recorded as ${tile.width}x${tile.height}`,
      );
    }
  }
};

/**
 * Streams a completed grid into one RGBA PNG. Only the tiles of the current
 * tile-row are decoded at any time; each output row is written and dropped
 * before the next is assembled.
 */
export const mergeTiles = async (
  grid: TileGrid,
  options: MergeOptions,
): Promise<Buffer> => {
  const {
    compressionLevel,
    filter = getPngFilter(),
    verticalOverlap = getMergeVerticalOverlap(),
    yieldEveryRows = getMergeYieldRows(),
    codec = sharpPngCodec,
    signal,
    onProgress,
    releaseTiles = false,
    sink,
    logger = defaultLogger,
    metrics = defaultMetrics,
  } = options;

  if (!Number.isInteger(yieldEveryRows) || yieldEveryRows < 1) {
    throw new RangeError(
      `yieldEveryRows must be an integer >= 1, received ${yieldEveryRows}`,
    );
  }

  if (!Number.isInteger(verticalOverlap) || verticalOverlap < 0) {
    throw new RangeError(
      `verticalOverlap must be an integer >= 0, received ${verticalOverlap}`,
    );
  }

  throwIfAborted(signal, "merging");
  assertGridGeometry(grid, verticalOverlap);

  const startedAt = performance.now();
  const chunks: Buffer[] = [];
  let outputBytes = 0;
  const writer = codec.createWriter({
    width: grid.finalWidth,
    height: grid.finalHeight,
    compressionLevel,
    filter,
    sink: (chunk) => {
      chunks.push(chunk);
      outputBytes += chunk.byteLength;
      sink?.(chunk);
    },
  });

  const outLine = new Uint8Array(grid.finalWidth * RGBA_CHANNELS);
  let outRow = 0;

  for (let tileY = 0; tileY < grid.rows; tileY += 1) {
    const readers: ScanlineReader[] = [];

    try {
      await openTileRow(grid, tileY, codec, readers);

      if (tileY > 0 && verticalOverlap > 0) {
        for (const reader of readers) {
          reader.skipRows(Math.min(verticalOverlap, reader.height - reader.rowsRead));
        }
      }

      const available = Math.min(
        ...readers.map((reader) => reader.height - reader.rowsRead),
      );
      const visible = Math.max(
        0,
        Math.min(available, grid.finalHeight - outRow),
      );

      for (let line = 0; line < visible; line += 1) {
        let offset = 0;

        for (const reader of readers) {
          const samples = reader.readRow();
          outLine.set(samples, offset);
          offset += samples.length;
        }

        writer.writeRow(outLine, outRow);
        outRow += 1;
        onProgress?.(outRow / grid.finalHeight);

        if (outRow % yieldEveryRows === 0) {
          await yieldControl(signal, "merging");
        }
      }
    } finally {
      for (const reader of readers) {
        reader.close();
      }
    }

    if (releaseTiles) {
      grid.releaseRow(tileY);
    }

    logger.debug("merge.tile_row_done", {
      tileY,
      rowsWritten: outRow,
      finalHeight: grid.finalHeight,
      released: releaseTiles,
    });
    await yieldControl(signal, "merging");
  }

  if (outRow !== grid.finalHeight) {
    throw new TileGeometryMismatchError(
      `Tiles supplied ${outRow} rows but the final image is ${grid.finalHeight}px tall`,
    );
  }

  writer.end();

  metrics.timer("merge.duration", performance.now() - startedAt, {
    width: grid.finalWidth,
    height: grid.finalHeight,
    cols: grid.cols,
    rows: grid.rows,
  });
  metrics.counter("merge.output.bytes", outputBytes);

  return Buffer.concat(chunks, outputBytes);
};
