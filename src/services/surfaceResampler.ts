import sharp from "sharp";
import {
  ResourceExhaustionError,
  RenderFailureError,
  isAllocationFailure,
} from "../models/errors";
import { RGBA_CHANNELS, type RgbaSurface } from "../models/surface";

/**
 * Shrinks a supersampled surface to `width` x `height`. Used when the
 * renderer cannot downsample on its own.
 */
export const resampleSurface = async (
  surface: RgbaSurface,
  width: number,
  height: number,
): Promise<RgbaSurface> => {
  try {
    const input = Buffer.from(
      surface.data.buffer,
      surface.data.byteOffset,
      surface.data.byteLength,
    );

    const data = await sharp(input, {
      raw: {
        width: surface.width,
        height: surface.height,
        channels: RGBA_CHANNELS,
      },
    })
      .resize(width, height, { fit: "fill", kernel: sharp.kernel.linear })
      .raw()
      .toBuffer();

    return { width, height, data };
  } catch (cause) {
    if (isAllocationFailure(cause)) {
      throw new ResourceExhaustionError(
        `Could not allocate a ${width}x${height} downsample surface`,
        { cause },
      );
    }

    throw new RenderFailureError(
      `Failed to downsample ${surface.width}x${surface.height} surface to ${width}x${height}`,
      { cause },
    );
  }
};
