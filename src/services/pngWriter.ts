import { Zlib, type DeflateOptions } from "fflate";
import type { PngFilter } from "../config";
import { EncodeFailureError } from "../models/errors";
import { RGBA_CHANNELS } from "../models/surface";
import { crc32 } from "../utils/crc32";

export const PNG_SIGNATURE = Buffer.from([
  0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a,
]);

const COLOR_TYPE_RGBA = 6;
const BIT_DEPTH = 8;
const IDAT_BATCH_BYTES = 256 * 1024;

const FILTER_CODES = {
  none: 0,
  sub: 1,
  up: 2,
  average: 3,
  paeth: 4,
} as const;

type FixedFilter = Exclude<PngFilter, "adaptive">;

const FIXED_FILTERS: readonly FixedFilter[] = [
  "none",
  "sub",
  "up",
  "average",
  "paeth",
];

type DeflateLevel = NonNullable<DeflateOptions["level"]>;

const isDeflateLevel = (value: number): value is DeflateLevel =>
  Number.isInteger(value) && value >= 0 && value <= 9;

export type ChunkSink = (chunk: Buffer) => void;

export interface ScanlineWriterOptions {
  width: number;
  height: number;
  compressionLevel: number;
  filter: PngFilter;
  sink: ChunkSink;
}

export interface ScanlineWriter {
  readonly rowsWritten: number;
  writeRow(samples: Uint8Array, rowIndex: number): void;
  end(): void;
}

export const serializeChunk = (type: string, data: Uint8Array): Buffer => {
  const header = Buffer.alloc(8);
  header.writeUInt32BE(data.byteLength, 0);
  header.write(type, 4, "ascii");

  const typeBytes = header.subarray(4, 8);
  const footer = Buffer.alloc(4);
  footer.writeUInt32BE(crc32(typeBytes, data), 0);

  return Buffer.concat([header, data, footer]);
};

const createHeaderChunk = (width: number, height: number) => {
  const data = Buffer.alloc(13);
  data.writeUInt32BE(width, 0);
  data.writeUInt32BE(height, 4);
  data[8] = BIT_DEPTH;
  data[9] = COLOR_TYPE_RGBA;
  data[10] = 0; // deflate
  data[11] = 0; // adaptive filtering
  data[12] = 0; // no interlace
  return serializeChunk("IHDR", data);
};

export const paethPredictor = (a: number, b: number, c: number) => {
  const p = a + b - c;
  const pa = Math.abs(p - a);
  const pb = Math.abs(p - b);
  const pc = Math.abs(p - c);

  if (pa <= pb && pa <= pc) return a;
  if (pb <= pc) return b;
  return c;
};

const predict = (filter: FixedFilter, a: number, b: number, c: number) => {
  switch (filter) {
    case "none":
      return 0;
    case "sub":
      return a;
    case "up":
      return b;
    case "average":
      return (a + b) >> 1;
    case "paeth":
      return paethPredictor(a, b, c);
  }
};

/**
 * Writes `filter`-filtered `row` into `out[1..]` with the filter code in
 * `out[0]`. `prior` is the previous raw row, all zeros for the first row.
 */
const applyFilter = (
  filter: FixedFilter,
  row: Uint8Array,
  prior: Uint8Array,
  out: Uint8Array,
) => {
  const bpp = RGBA_CHANNELS;
  out[0] = FILTER_CODES[filter];

  for (let i = 0; i < row.length; i += 1) {
    const a = i >= bpp ? row[i - bpp] : 0;
    const c = i >= bpp ? prior[i - bpp] : 0;
    out[i + 1] = (row[i] - predict(filter, a, prior[i], c)) & 0xff;
  }
};

const filterCost = (filtered: Uint8Array) => {
  let sum = 0;
  for (let i = 1; i < filtered.length; i += 1) {
    const v = filtered[i];
    sum += v < 128 ? v : 256 - v;
  }
  return sum;
};

/**
 * Sequential RGBA PNG encoder. Rows are filtered and deflated as they arrive,
 * so at most one raw row plus one compressed batch is held at a time.
 */
export class StreamingPngWriter implements ScanlineWriter {
  private readonly rowBytes: number;
  private readonly prior: Uint8Array;
  private readonly candidates: Uint8Array[];
  private readonly deflater: Zlib;
  private pending: Uint8Array[] = [];
  private pendingBytes = 0;
  private written = 0;
  private finished = false;

  constructor(private readonly options: ScanlineWriterOptions) {
    const { width, height, compressionLevel } = options;

    if (
      !Number.isInteger(width) ||
      !Number.isInteger(height) ||
      width <= 0 ||
      height <= 0
    ) {
      throw new EncodeFailureError(
        `Cannot write a ${width}x${height} PNG`,
      );
    }

    if (!isDeflateLevel(compressionLevel)) {
      throw new EncodeFailureError(
        `PNG compression level must be an integer in 0..9, received ${compressionLevel}`,
      );
    }

    this.rowBytes = width * RGBA_CHANNELS;
    this.prior = new Uint8Array(this.rowBytes);
    this.candidates =
      options.filter === "adaptive"
        ? FIXED_FILTERS.map(() => new Uint8Array(this.rowBytes + 1))
        : [];

    this.deflater = new Zlib({ level: compressionLevel }, (data, final) => {
      this.pending.push(data.slice());
      this.pendingBytes += data.byteLength;

      if (final || this.pendingBytes >= IDAT_BATCH_BYTES) {
        this.flushPending();
      }
    });

    this.options.sink(Buffer.from(PNG_SIGNATURE));
    this.options.sink(createHeaderChunk(width, height));
  }

  get rowsWritten(): number {
    return this.written;
  }

  writeRow(samples: Uint8Array, rowIndex: number): void {
    if (this.finished) {
      throw new EncodeFailureError("Cannot write rows after the PNG was finalized");
    }

    if (rowIndex !== this.written) {
      throw new EncodeFailureError(
        `PNG rows must be written in order: expected row ${this.written}, received ${rowIndex}`,
      );
    }

    if (this.written >= this.options.height) {
      throw new EncodeFailureError(
        `PNG already holds all ${this.options.height} rows`,
      );
    }

    if (samples.length !== this.rowBytes) {
      throw new EncodeFailureError(
        `Row ${rowIndex} has ${samples.length} samples, expected ${this.rowBytes}`,
      );
    }

    this.deflater.push(this.filterRow(samples));
    this.prior.set(samples);
    this.written += 1;
  }

  end(): void {
    if (this.finished) {
      return;
    }

    if (this.written !== this.options.height) {
      throw new EncodeFailureError(
        `PNG declared ${this.options.height} rows but ${this.written} were written`,
      );
    }

    this.finished = true;
    this.deflater.push(new Uint8Array(0), true);
    this.flushPending();
    this.options.sink(serializeChunk("IEND", new Uint8Array(0)));
  }

  private filterRow(samples: Uint8Array): Uint8Array {
    const { filter } = this.options;

    if (filter !== "adaptive") {
      const out = new Uint8Array(this.rowBytes + 1);
      applyFilter(filter, samples, this.prior, out);
      return out;
    }

    let best = 0;
    let bestCost = Number.POSITIVE_INFINITY;

    FIXED_FILTERS.forEach((candidate, index) => {
      const out = this.candidates[index];
      applyFilter(candidate, samples, this.prior, out);
      const cost = filterCost(out);
      if (cost < bestCost) {
        bestCost = cost;
        best = index;
      }
    });

    // The deflater may keep a reference to what it is given.
    return this.candidates[best].slice();
  }

  private flushPending() {
    if (this.pendingBytes === 0) {
      this.pending = [];
      return;
    }

    const data = Buffer.concat(this.pending, this.pendingBytes);
    this.pending = [];
    this.pendingBytes = 0;
    this.options.sink(serializeChunk("IDAT", data));
  }
}
