import sharp from "sharp";
import { DecodeFailureError, EncodeFailureError } from "../models/errors";
import { RGBA_CHANNELS, isWellFormedSurface, type RgbaSurface } from "../models/surface";
import { openPngStream } from "./pngReader";
import {
  PNG_SIGNATURE,
  StreamingPngWriter,
  type ScanlineWriter,
  type ScanlineWriterOptions,
} from "./pngWriter";

export interface ScanlineReader {
  readonly width: number;
  readonly height: number;
  readonly channels: number;
  readonly rowsRead: number;
  /**
   * Next row's interleaved samples (`width * channels` bytes). The returned
   * view may be overwritten by the following read.
   */
  readRow(): Uint8Array;
  /** Skips up to `count` rows and returns how many were skipped. */
  skipRows(count: number): number;
  close(): void;
}

export interface PngCodec {
  encode(surface: RgbaSurface, compressionLevel: number): Promise<Buffer>;
  openReader(pngBytes: Buffer): Promise<ScanlineReader>;
  createWriter(options: ScanlineWriterOptions): ScanlineWriter;
}

const hasPngSignature = (bytes: Buffer) =>
  bytes.byteLength >= PNG_SIGNATURE.byteLength &&
  bytes.subarray(0, PNG_SIGNATURE.byteLength).equals(PNG_SIGNATURE);

/**
 * Encodes tiles through sharp. Tiles are read back one scanline at a time and
 * the merged output goes through the streaming writer, so neither side is
 * ever held uncompressed.
 */
export const sharpPngCodec: PngCodec = {
  encode: async (surface, compressionLevel) => {
    if (!isWellFormedSurface(surface, surface.width, surface.height)) {
      throw new EncodeFailureError(
        `Surface buffer holds ${surface.data.byteLength} bytes, expected ${surface.width}x${surface.height} RGBA`,
      );
    }

    try {
      const input = Buffer.from(
        surface.data.buffer,
        surface.data.byteOffset,
        surface.data.byteLength,
      );

      return await sharp(input, {
        raw: {
          width: surface.width,
          height: surface.height,
          channels: RGBA_CHANNELS,
        },
      })
        .png({ compressionLevel })
        .toBuffer();
    } catch (cause) {
      throw new EncodeFailureError(
        `Failed to encode ${surface.width}x${surface.height} tile as PNG`,
        { cause },
      );
    }
  },

  openReader: async (pngBytes) => {
    if (!hasPngSignature(pngBytes)) {
      throw new DecodeFailureError("Tile bytes are not a PNG stream");
    }

    try {
      return openPngStream(pngBytes);
    } catch (cause) {
      throw new DecodeFailureError("Failed to decode PNG tile", { cause });
    }
  },

  createWriter: (options) => new StreamingPngWriter(options),
};
