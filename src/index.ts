export {
  CaptureContext,
  CAPTURE_STAGE_INDEX,
  type CaptureCallOptions,
  type CaptureContextOptions,
  type CaptureProgress,
  type CaptureStage,
  type ProgressListener,
} from "./services/captureContext";
export {
  planGrid,
  projectionForTile,
  storageRow,
  MIN_TILE_SIDE,
  type GridGeometry,
  type NdcBounds,
  type PlanOptions,
  type PlannedTile,
} from "./services/gridPlanner";
export {
  captureTiles,
  TRANSPARENT,
  type CaptureTilesOptions,
  type RgbaColor,
  type TileRenderer,
  type TileRenderRequest,
} from "./services/tileCapture";
export { mergeTiles, assertGridGeometry, type MergeOptions } from "./services/tileMerger";
export { sharpPngCodec, type PngCodec, type ScanlineReader } from "./services/pngCodec";
export {
  StreamingPngReader,
  openPngStream,
  readPngLayout,
  type PngLayout,
} from "./services/pngReader";
export {
  StreamingPngWriter,
  type ChunkSink,
  type ScanlineWriter,
  type ScanlineWriterOptions,
} from "./services/pngWriter";
export { resampleSurface } from "./services/surfaceResampler";
export {
  parseCaptureRequest,
  captureRequestSchema,
  type CaptureRequest,
  type CaptureRequestInput,
} from "./models/captureRequest";
export type {
  CaptureMetadata,
  CaptureOutcome,
  CaptureResult,
} from "./models/captureResult";
export * from "./models/errors";
export {
  frustumMatrix,
  orthographicMatrix,
  type CameraDescriptor,
  type Matrix4,
  type OrthographicCamera,
  type PerspectiveCamera,
} from "./models/projection";
export {
  COMMON_RESOLUTIONS,
  createResolution,
  formatResolution,
  listCommonResolutions,
  type Resolution,
} from "./models/resolution";
export type { RgbaSurface } from "./models/surface";
export { TileGrid, type PngTile } from "./models/tileGrid";
export { createLogger, type Logger } from "./utils/logger";
export { createMetrics, type Metrics } from "./utils/metrics";
