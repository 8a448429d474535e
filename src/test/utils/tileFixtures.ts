import sharp from "sharp";
import { TileGrid } from "../../models/tileGrid";
import type { PixelPainter } from "./syntheticRenderer";

/** Raw RGBA bytes of a `width` x `height` image painted by `paint`. */
export const paintImage = (width: number, height: number, paint: PixelPainter) => {
  const data = Buffer.alloc(width * height * 4);

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      data.set(paint(x, y), (y * width + x) * 4);
    }
  }

  return data;
};

export const encodeRgba = (
  width: number,
  height: number,
  paint: PixelPainter,
  offsetX = 0,
  offsetY = 0,
) =>
  sharp(paintImage(width, height, (x, y) => paint(offsetX + x, offsetY + y)), {
    raw: { width, height, channels: 4 },
  })
    .png()
    .toBuffer();

export const encodeSolid = (
  width: number,
  height: number,
  [r, g, b, alpha]: readonly [number, number, number, number],
  compressionLevel = 1,
) =>
  sharp({
    create: {
      width,
      height,
      channels: 4,
      background: { r, g, b, alpha: alpha / 255 },
    },
  })
    .png({ compressionLevel })
    .toBuffer();

export const encodeRgb = (width: number, height: number) =>
  sharp({
    create: {
      width,
      height,
      channels: 3,
      background: { r: 200, g: 100, b: 50 },
    },
  })
    .png()
    .toBuffer();

/**
 * Cuts a `paint`-ed image into tiles of the given column widths and row
 * heights (top row first) and stores them in a grid.
 */
export const buildGrid = async (
  colWidths: readonly number[],
  rowHeights: readonly number[],
  paint: PixelPainter,
  finalSize?: { width: number; height: number },
): Promise<TileGrid> => {
  const width = finalSize?.width ?? colWidths.reduce((sum, value) => sum + value, 0);
  const height = finalSize?.height ?? rowHeights.reduce((sum, value) => sum + value, 0);
  const grid = new TileGrid(colWidths.length, rowHeights.length, width, height);

  let offsetY = 0;
  for (const [tileY, tileHeight] of rowHeights.entries()) {
    let offsetX = 0;
    for (const [tileX, tileWidth] of colWidths.entries()) {
      const png = await encodeRgba(tileWidth, tileHeight, paint, offsetX, offsetY);
      grid.setTile(tileX, tileY, tileWidth, tileHeight, png);
      offsetX += tileWidth;
    }
    offsetY += tileHeight;
  }

  return grid;
};

export const decodeRgba = async (png: Buffer) => {
  const { data, info } = await sharp(png)
    .raw()
    .toBuffer({ resolveWithObject: true });

  return { data, width: info.width, height: info.height, channels: info.channels };
};

export const pixelAt = (
  image: { data: Buffer; width: number; channels: number },
  x: number,
  y: number,
) => {
  const offset = (y * image.width + x) * image.channels;
  return Array.from(image.data.subarray(offset, offset + image.channels));
};
