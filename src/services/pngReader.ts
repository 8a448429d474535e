import { Unzlib } from "fflate";
import { DecodeFailureError } from "../models/errors";
import { crc32 } from "../utils/crc32";
import type { ScanlineReader } from "./pngCodec";
import { PNG_SIGNATURE, paethPredictor } from "./pngWriter";

const CHANNELS_BY_COLOR_TYPE = new Map<number, number>([
  [0, 1], // grey
  [2, 3], // rgb
  [4, 2], // grey + alpha
  [6, 4], // rgba
]);

// Compressed slices pushed per scanline at the ratio observed so far.
const SLICES_PER_ROW = 4;
const MIN_SLICE_BYTES = 16;
const MAX_SLICE_BYTES = 16 * 1024;

export interface PngLayout {
  width: number;
  height: number;
  channels: number;
  /** IDAT payloads in file order; views into the source bytes. */
  data: Uint8Array[];
}

const parseHeader = (body: Uint8Array) => {
  if (body.byteLength !== 13) {
    throw new Error(`IHDR holds ${body.byteLength} bytes, expected 13`);
  }

  const view = new DataView(body.buffer, body.byteOffset, body.byteLength);
  const width = view.getUint32(0);
  const height = view.getUint32(4);
  const bitDepth = body[8];
  const colorType = body[9];
  const channels = CHANNELS_BY_COLOR_TYPE.get(colorType);

  if (width === 0 || height === 0) {
    throw new Error(`PNG declares an empty ${width}x${height} image`);
  }

  if (channels === undefined) {
    throw new Error(`Unsupported PNG color type ${colorType}`);
  }

  if (bitDepth !== 8) {
    throw new Error(`Unsupported PNG bit depth ${bitDepth}`);
  }

  if (body[12] !== 0) {
    throw new Error("Interlaced PNGs are not supported");
  }

  return { width, height, channels };
};

/**
 * Walks the chunk list of a PNG, checking every CRC, and returns the header
 * fields together with views of the IDAT payloads. Nothing is inflated.
 */
export const readPngLayout = (bytes: Uint8Array): PngLayout => {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const data: Uint8Array[] = [];
  let header: ReturnType<typeof parseHeader> | null = null;
  let offset = PNG_SIGNATURE.byteLength;

  for (;;) {
    if (offset + 8 > bytes.byteLength) {
      throw new Error(`PNG chunk at byte ${offset} is truncated`);
    }

    const length = view.getUint32(offset);
    const typeBytes = bytes.subarray(offset + 4, offset + 8);
    const type = String.fromCharCode(...typeBytes);
    const bodyStart = offset + 8;
    const bodyEnd = bodyStart + length;

    if (bodyEnd + 4 > bytes.byteLength) {
      throw new Error(`PNG chunk at byte ${offset} is truncated`);
    }

    const body = bytes.subarray(bodyStart, bodyEnd);
    if (view.getUint32(bodyEnd) !== crc32(typeBytes, body)) {
      throw new Error(`PNG ${type} chunk at byte ${offset} fails its CRC check`);
    }

    offset = bodyEnd + 4;

    if (type === "IHDR") {
      header = parseHeader(body);
    } else if (type === "IDAT") {
      data.push(body);
    } else if (type === "IEND") {
      break;
    }
  }

  if (!header) {
    throw new Error("PNG has no IHDR chunk");
  }

  if (data.length === 0) {
    throw new Error("PNG has no IDAT chunk");
  }

  return { ...header, data };
};

/**
 * Inflates and un-filters one scanline per `readRow`. Compressed input is fed
 * in slices sized from the ratio seen so far, so decoded bytes waiting to be
 * read stay around one or two scanlines. The row returned by `readRow` is
 * reused by the next read.
 */
export class StreamingPngReader implements ScanlineReader {
  readonly width: number;
  readonly height: number;
  readonly channels: number;
  private readonly inflater: Unzlib;
  private readonly scanline: Uint8Array;
  private row: Uint8Array;
  private prior: Uint8Array;
  private pending: Uint8Array[] = [];
  private pendingBytes = 0;
  private headOffset = 0;
  private chunkIndex = 0;
  private chunkOffset = 0;
  private consumed = 0;
  private produced = 0;
  private peak = 0;
  private next = 0;
  private closed = false;

  constructor(private readonly layout: PngLayout) {
    this.width = layout.width;
    this.height = layout.height;
    this.channels = layout.channels;

    const rowBytes = layout.width * layout.channels;
    this.scanline = new Uint8Array(rowBytes + 1);
    this.row = new Uint8Array(rowBytes);
    this.prior = new Uint8Array(rowBytes);

    this.inflater = new Unzlib((data) => {
      this.pending.push(data);
      this.pendingBytes += data.byteLength;
      this.produced += data.byteLength;
    });
  }

  get rowsRead(): number {
    return this.next;
  }

  /** Most inflated bytes held between reads so far. */
  get peakBufferedBytes(): number {
    return this.peak;
  }

  readRow(): Uint8Array {
    if (this.closed) {
      throw new DecodeFailureError("Cannot read from a closed tile reader");
    }

    if (this.next >= this.height) {
      throw new DecodeFailureError(
        `Tile has ${this.height} rows, cannot read row ${this.next}`,
      );
    }

    this.fill(this.scanline.byteLength);
    this.take(this.scanline);
    this.unfilter();
    this.next += 1;
    return this.row;
  }

  /** Skipped rows are still inflated; the filters chain through them. */
  skipRows(count: number): number {
    const skipped = Math.max(0, Math.min(count, this.height - this.next));

    for (let i = 0; i < skipped; i += 1) {
      this.readRow();
    }

    return skipped;
  }

  close(): void {
    this.closed = true;
    this.pending = [];
    this.pendingBytes = 0;
    this.headOffset = 0;
  }

  private fill(needed: number) {
    const { data } = this.layout;

    while (this.pendingBytes < needed) {
      if (this.chunkIndex >= data.length) {
        throw new DecodeFailureError(
          `PNG data ended after ${this.next} of ${this.height} rows`,
        );
      }

      const chunk = data[this.chunkIndex];
      const size =
        this.produced === 0
          ? MIN_SLICE_BYTES
          : Math.min(
              MAX_SLICE_BYTES,
              Math.max(
                MIN_SLICE_BYTES,
                Math.ceil(
                  ((needed - this.pendingBytes) * this.consumed) /
                    (this.produced * SLICES_PER_ROW),
                ),
              ),
            );
      const end = Math.min(chunk.byteLength, this.chunkOffset + size);
      const slice = chunk.subarray(this.chunkOffset, end);

      if (end === chunk.byteLength) {
        this.chunkIndex += 1;
        this.chunkOffset = 0;
      } else {
        this.chunkOffset = end;
      }

      this.consumed += slice.byteLength;

      try {
        this.inflater.push(slice, this.chunkIndex >= data.length);
      } catch (cause) {
        throw new DecodeFailureError(
          `Failed to inflate PNG data at row ${this.next}`,
          { cause },
        );
      }
    }

    this.peak = Math.max(this.peak, this.pendingBytes);
  }

  private take(target: Uint8Array) {
    let filled = 0;

    while (filled < target.byteLength) {
      const head = this.pending[0];
      const count = Math.min(
        head.byteLength - this.headOffset,
        target.byteLength - filled,
      );

      target.set(head.subarray(this.headOffset, this.headOffset + count), filled);
      filled += count;
      this.headOffset += count;

      if (this.headOffset === head.byteLength) {
        this.pending.shift();
        this.headOffset = 0;
      }
    }

    this.pendingBytes -= target.byteLength;
  }

  private unfilter() {
    const previous = this.row;
    this.row = this.prior;
    this.prior = previous;

    const filterType = this.scanline[0];
    const raw = this.scanline.subarray(1);
    const { row, prior } = this;
    const bpp = this.channels;

    if (filterType > 4) {
      throw new DecodeFailureError(
        `Row ${this.next} uses unknown PNG filter type ${filterType}`,
      );
    }

    for (let i = 0; i < raw.byteLength; i += 1) {
      const a = i >= bpp ? row[i - bpp] : 0;
      const b = prior[i];
      const c = i >= bpp ? prior[i - bpp] : 0;

      switch (filterType) {
        case 0:
          row[i] = raw[i];
          break;
        case 1:
          row[i] = raw[i] + a;
          break;
        case 2:
          row[i] = raw[i] + b;
          break;
        case 3:
          row[i] = raw[i] + ((a + b) >> 1);
          break;
        default:
          row[i] = raw[i] + paethPredictor(a, b, c);
      }
    }
  }
}

export const openPngStream = (bytes: Uint8Array) =>
  new StreamingPngReader(readPngLayout(bytes));
