import type { RgbaSurface } from "../../models/surface";
import type { TileRenderer, TileRenderRequest } from "../../services/tileCapture";

export type PixelPainter = (x: number, y: number) => readonly [number, number, number, number];

/** Deterministic, position-unique color for full-image pixel (x, y). */
export const positionColor: PixelPainter = (x, y) => [
  x & 0xff,
  y & 0xff,
  ((x >> 8) * 16 + (y >> 8)) & 0xff,
  255,
];

export interface SyntheticRendererOptions {
  finalWidth: number;
  finalHeight: number;
  orthographicSize: number;
  paint?: PixelPainter;
}

/**
 * Orthographic stand-in for a GPU renderer: recovers the tile's view bounds
 * from its projection matrix and paints the full-image pixel each sample
 * lands on, so any drift in the matrices shows up as wrong colors.
 */
export class SyntheticRenderer implements TileRenderer {
  readonly requests: TileRenderRequest[] = [];
  released = 0;
  live = 0;
  peakLive = 0;

  private readonly paint: PixelPainter;

  constructor(private readonly options: SyntheticRendererOptions) {
    this.paint = options.paint ?? positionColor;
  }

  async render(request: TileRenderRequest): Promise<RgbaSurface> {
    this.requests.push(request);

    const m = request.projection;
    const left = (-1 - m[3]) / m[0];
    const right = (1 - m[3]) / m[0];
    const bottom = (-1 - m[7]) / m[5];
    const top = (1 - m[7]) / m[5];

    const { finalWidth, finalHeight, orthographicSize } = this.options;
    const halfHeight = orthographicSize;
    const halfWidth = halfHeight * (finalWidth / finalHeight);

    const { width, height } = request;
    const data = new Uint8Array(width * height * 4);

    for (let row = 0; row < height; row += 1) {
      const worldY = top - ((row + 0.5) * (top - bottom)) / height;
      const imageY = Math.round(
        ((halfHeight - worldY) / (2 * halfHeight)) * finalHeight - 0.5,
      );

      for (let col = 0; col < width; col += 1) {
        const worldX = left + ((col + 0.5) * (right - left)) / width;
        const imageX = Math.round(
          ((worldX + halfWidth) / (2 * halfWidth)) * finalWidth - 0.5,
        );

        data.set(this.paint(imageX, imageY), (row * width + col) * 4);
      }
    }

    this.track();
    return { width, height, data };
  }

  release(): void {
    this.released += 1;
    this.live -= 1;
  }

  private track() {
    this.live += 1;
    this.peakLive = Math.max(this.peakLive, this.live);
  }
}

/**
 * Renderer that returns uniformly filled surfaces and records what it was
 * asked for. `downsample` refills the target size with the first pixel.
 */
export class RecordingRenderer implements TileRenderer {
  readonly requests: TileRenderRequest[] = [];
  readonly downsamples: Array<{ from: [number, number]; to: [number, number] }> = [];
  readonly released: RgbaSurface[] = [];

  constructor(private readonly fill: readonly [number, number, number, number] = [10, 20, 30, 255]) {}

  async render(request: TileRenderRequest): Promise<RgbaSurface> {
    this.requests.push(request);
    const color = request.clearColor ?? this.fill;
    return this.filled(request.width, request.height, color);
  }

  async downsample(surface: RgbaSurface, width: number, height: number): Promise<RgbaSurface> {
    this.downsamples.push({ from: [surface.width, surface.height], to: [width, height] });
    return this.filled(width, height, [surface.data[0], surface.data[1], surface.data[2], surface.data[3]]);
  }

  release(surface: RgbaSurface): void {
    this.released.push(surface);
  }

  private filled(width: number, height: number, color: readonly [number, number, number, number]): RgbaSurface {
    const data = new Uint8Array(width * height * 4);
    for (let offset = 0; offset < data.length; offset += 4) {
      data.set(color, offset);
    }
    return { width, height, data };
  }
}
