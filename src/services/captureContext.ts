import { randomUUID } from "node:crypto";
import { performance } from "node:perf_hooks";
import {
  getDeviceMaxSurfaceSide,
  getMaxTileSide,
  getMergeVerticalOverlap,
  getMergeYieldRows,
  getPngCompressionLevel,
  getPngFilter,
  loadConfig,
  type AppConfig,
} from "../config";
import {
  parseCaptureRequest,
  supersampleFactor,
} from "../models/captureRequest";
import type { CaptureOutcome, CaptureResult } from "../models/captureResult";
import { CaptureBusyError } from "../models/errors";
import { logger as defaultLogger, type Logger } from "../utils/logger";
import { createMetrics, type Metrics } from "../utils/metrics";
import { planGrid } from "./gridPlanner";
import type { PngCodec } from "./pngCodec";
import type { ChunkSink } from "./pngWriter";
import { captureTiles, type TileRenderer } from "./tileCapture";
import { mergeTiles, type MergeOptions } from "./tileMerger";

export type CaptureStage = "tiling" | "merging";

/** Numeric stage ids for callers that report stages as integers. */
export const CAPTURE_STAGE_INDEX: Record<CaptureStage, number> = {
  tiling: 0,
  merging: 1,
};

export interface CaptureProgress {
  stage: CaptureStage;
  progress: number;
}

export type ProgressListener = (progress: CaptureProgress) => void;

export interface CaptureContextOptions {
  renderer: TileRenderer;
  codec?: PngCodec;
  logger?: Logger;
  metrics?: Metrics;
  config?: AppConfig;
  maxTileSide?: number;
  deviceMaxSurfaceSide?: number;
  merge?: Pick<
    MergeOptions,
    "filter" | "verticalOverlap" | "yieldEveryRows" | "releaseTiles"
  >;
}

export interface CaptureCallOptions {
  signal?: AbortSignal;
  /** Receives the merged PNG chunk by chunk while it is produced. */
  sink?: ChunkSink;
}

/**
 * Owns one renderer and runs at most one capture at a time. Contexts are
 * independent of each other; create as many as needed.
 */
export class CaptureContext {
  private running = false;
  private current: CaptureProgress | null = null;
  private readonly listeners = new Set<ProgressListener>();
  private readonly logger: Logger;
  private readonly metrics: Metrics;
  private readonly config: AppConfig;

  constructor(private readonly options: CaptureContextOptions) {
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? createMetrics(this.logger);
    this.config = options.config ?? loadConfig();
  }

  get busy(): boolean {
    return this.running;
  }

  /** Latest progress of the running (or last) capture, if any. */
  get progress(): CaptureProgress | null {
    return this.current;
  }

  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async capture(
    payload: unknown,
    { signal, sink }: CaptureCallOptions = {},
  ): Promise<CaptureResult> {
    if (this.running) {
      throw new CaptureBusyError();
    }

    this.running = true;

    try {
      return await this.run(payload, signal, sink);
    } finally {
      this.running = false;
    }
  }

  async tryCapture(
    payload: unknown,
    options: CaptureCallOptions = {},
  ): Promise<CaptureOutcome> {
    try {
      return { ok: true, result: await this.capture(payload, options) };
    } catch (error) {
      return {
        ok: false,
        error: error instanceof Error ? error : new Error(String(error)),
      };
    }
  }

  private async run(
    payload: unknown,
    signal: AbortSignal | undefined,
    sink: ChunkSink | undefined,
  ): Promise<CaptureResult> {
    const request = parseCaptureRequest(payload);
    const compressionLevel =
      request.compressionLevel ?? getPngCompressionLevel(this.config);
    const captureLogger = this.logger.child({ captureId: randomUUID() });

    const geometry = planGrid({
      finalWidth: request.width,
      finalHeight: request.height,
      maxTileSide: this.options.maxTileSide ?? getMaxTileSide(this.config),
      deviceMaxSurfaceSide:
        this.options.deviceMaxSurfaceSide ?? getDeviceMaxSurfaceSide(this.config),
      supersample: supersampleFactor(request),
    });

    captureLogger.info("capture.started", {
      width: geometry.finalWidth,
      height: geometry.finalHeight,
      cols: geometry.cols,
      rows: geometry.rows,
      tileSide: geometry.tileSide,
      supersample: geometry.supersample,
      camera: request.camera.kind,
    });

    const startedAt = performance.now();

    try {
      this.emit("tiling", 0);
      const grid = await captureTiles(this.options.renderer, {
        camera: request.camera,
        geometry,
        transparentBackground: request.transparentBackground,
        compressionLevel,
        codec: this.options.codec,
        signal,
        onProgress: (progress) => this.emit("tiling", progress),
        logger: captureLogger,
        metrics: this.metrics,
      });
      const tilingMs = performance.now() - startedAt;
      this.metrics.timer("capture.tiling.duration", tilingMs, {
        tiles: grid.size,
      });

      this.emit("merging", 0);
      const mergeStartedAt = performance.now();
      const merge = this.options.merge ?? {};
      const buffer = await mergeTiles(grid, {
        compressionLevel,
        filter: merge.filter ?? getPngFilter(this.config),
        verticalOverlap: merge.verticalOverlap ?? getMergeVerticalOverlap(this.config),
        yieldEveryRows: merge.yieldEveryRows ?? getMergeYieldRows(this.config),
        releaseTiles: merge.releaseTiles ?? true,
        codec: this.options.codec,
        signal,
        sink,
        onProgress: (progress) => this.emit("merging", progress),
        logger: captureLogger,
        metrics: this.metrics,
      });
      const mergingMs = performance.now() - mergeStartedAt;
      const totalMs = performance.now() - startedAt;

      captureLogger.info("capture.completed", {
        bytes: buffer.byteLength,
        tilingMs,
        mergingMs,
        totalMs,
      });

      return {
        buffer,
        contentType: "image/png",
        metadata: {
          output: {
            width: geometry.finalWidth,
            height: geometry.finalHeight,
            bytes: buffer.byteLength,
            contentType: "image/png",
          },
          grid: {
            cols: geometry.cols,
            rows: geometry.rows,
            tileSide: geometry.tileSide,
          },
          supersample: geometry.supersample,
          compressionLevel,
          transparentBackground: request.transparentBackground,
          durations: { tilingMs, mergingMs, totalMs },
        },
      };
    } catch (error) {
      captureLogger.error("capture.failed", error, {
        stage: this.current?.stage,
        progress: this.current?.progress,
      });
      throw error;
    }
  }

  private emit(stage: CaptureStage, progress: number) {
    const update = { stage, progress };
    this.current = update;

    for (const listener of this.listeners) {
      try {
        listener(update);
      } catch (error) {
        this.logger.warn("capture.progress_listener_failed", {
          stage,
          progress,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
