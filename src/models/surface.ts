export const RGBA_CHANNELS = 4;

/**
 * Tightly packed 8-bit RGBA pixels, rows top to bottom.
 */
export interface RgbaSurface {
  width: number;
  height: number;
  data: Uint8Array;
}

export const surfaceByteLength = (width: number, height: number) =>
  width * height * RGBA_CHANNELS;

export const isWellFormedSurface = (
  surface: RgbaSurface,
  width: number,
  height: number,
) =>
  surface.width === width &&
  surface.height === height &&
  surface.data.byteLength === surfaceByteLength(width, height);
