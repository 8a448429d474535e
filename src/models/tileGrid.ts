import { InvalidDimensionsError, TileMissingError } from "./errors";

export interface PngTile {
  readonly tileX: number;
  readonly tileY: number;
  readonly width: number;
  readonly height: number;
  readonly pngBytes: Buffer;
}

const isPositiveInteger = (value: number) =>
  Number.isInteger(value) && value > 0;

/**
 * Fixed-size grid of encoded tiles plus the logical size of the merged image.
 * Slots live in one flat array addressed as `row * cols + col`; row 0 is the
 * top of the final image.
 */
export class TileGrid {
  private readonly tiles: (PngTile | undefined)[];

  constructor(
    readonly cols: number,
    readonly rows: number,
    readonly finalWidth: number,
    readonly finalHeight: number,
  ) {
    if (!isPositiveInteger(finalWidth) || !isPositiveInteger(finalHeight)) {
      throw new InvalidDimensionsError(finalWidth, finalHeight);
    }

    if (!isPositiveInteger(cols) || !isPositiveInteger(rows)) {
      throw new InvalidDimensionsError(
        cols,
        rows,
        `Tile grid must have at least one column and row, received ${cols}x${rows}`,
      );
    }

    this.tiles = Array.from({ length: cols * rows }, () => undefined);
  }

  get size(): number {
    return this.tiles.length;
  }

  setTile(
    tileX: number,
    tileY: number,
    width: number,
    height: number,
    pngBytes: Buffer,
  ): PngTile {
    const index = this.indexOf(tileX, tileY);
    const tile: PngTile = Object.freeze({ tileX, tileY, width, height, pngBytes });
    this.tiles[index] = tile;
    return tile;
  }

  getTile(tileX: number, tileY: number): PngTile | undefined {
    return this.tiles[this.indexOf(tileX, tileY)];
  }

  requireTile(tileX: number, tileY: number): PngTile {
    const tile = this.getTile(tileX, tileY);

    if (!tile) {
      throw new TileMissingError(tileX, tileY);
    }

    return tile;
  }

  isComplete(): boolean {
    return this.tiles.every((tile) => tile !== undefined);
  }

  /** Drops every tile of `tileY` so its bytes can be collected. */
  releaseRow(tileY: number): void {
    for (let tileX = 0; tileX < this.cols; tileX += 1) {
      this.tiles[this.indexOf(tileX, tileY)] = undefined;
    }
  }

  private indexOf(tileX: number, tileY: number): number {
    if (
      !Number.isInteger(tileX) ||
      !Number.isInteger(tileY) ||
      tileX < 0 ||
      tileY < 0 ||
      tileX >= this.cols ||
      tileY >= this.rows
    ) {
      throw new RangeError(
        `Tile (${tileX}, ${tileY}) is outside the ${this.cols}x${this.rows} grid`,
      );
    }

    return tileY * this.cols + tileX;
  }
}
