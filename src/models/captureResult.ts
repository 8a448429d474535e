export interface CaptureMetadata {
  output: {
    width: number;
    height: number;
    bytes: number;
    contentType: 'image/png';
  };
  grid: {
    cols: number;
    rows: number;
    tileSide: number;
  };
  supersample: number;
  compressionLevel: number;
  transparentBackground: boolean;
  durations: {
    tilingMs: number;
    mergingMs: number;
    totalMs: number;
  };
}

export interface CaptureResult {
  buffer: Buffer;
  contentType: 'image/png';
  metadata: CaptureMetadata;
}

export type CaptureOutcome =
  | { ok: true; result: CaptureResult }
  | { ok: false; error: Error };
