import { config as loadEnv } from "dotenv";

loadEnv({ quiet: true });

export type Env = Record<string, string | undefined>;

export interface AppConfig {
  LOG_LEVEL: string | undefined;
  MAX_TILE_SIDE: string | undefined;
  DEVICE_MAX_SURFACE_SIDE: string | undefined;
  PNG_COMPRESSION_LEVEL: string | undefined;
  PNG_FILTER: string | undefined;
  MERGE_YIELD_ROWS: string | undefined;
  MERGE_VERTICAL_OVERLAP: string | undefined;
}

const deriveEnv = (raw: Env): AppConfig => ({
  LOG_LEVEL: raw.LOG_LEVEL,
  MAX_TILE_SIDE: raw.MAX_TILE_SIDE,
  DEVICE_MAX_SURFACE_SIDE: raw.DEVICE_MAX_SURFACE_SIDE,
  PNG_COMPRESSION_LEVEL: raw.PNG_COMPRESSION_LEVEL,
  PNG_FILTER: raw.PNG_FILTER,
  MERGE_YIELD_ROWS: raw.MERGE_YIELD_ROWS,
  MERGE_VERTICAL_OVERLAP: raw.MERGE_VERTICAL_OVERLAP,
});

let cachedConfig: AppConfig | null = null;

export const loadConfig = (env: Env = process.env): AppConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = deriveEnv(env);
  return cachedConfig;
};

export const resetConfigCache = () => {
  cachedConfig = null;
};

const NUMBER_PATTERN = /^-?\d+$/;

const parseIntegerEnv = (
  raw: string | undefined,
  field: string,
  fallback: number,
  { min = 0, max = Number.MAX_SAFE_INTEGER }: { min?: number; max?: number } = {},
): number => {
  if (raw === undefined) {
    return fallback;
  }

  const trimmed = raw.trim();

  if (trimmed.length === 0) {
    throw new Error(`${field} must not be empty`);
  }

  if (!NUMBER_PATTERN.test(trimmed)) {
    throw new Error(`${field} must be an integer, received "${raw}"`);
  }

  const value = Number.parseInt(trimmed, 10);

  if (!Number.isFinite(value)) {
    throw new Error(`${field} must be a finite integer, received "${raw}"`);
  }

  if (value < min) {
    throw new Error(`${field} must be >= ${min}, received ${value}`);
  }

  if (value > max) {
    throw new Error(`${field} must be <= ${max}, received ${value}`);
  }

  return value;
};

export const DEFAULT_MAX_TILE_SIDE = 3072;
export const DEFAULT_DEVICE_MAX_SURFACE_SIDE = 16_384;
export const DEFAULT_PNG_COMPRESSION_LEVEL = 6;
export const DEFAULT_MERGE_YIELD_ROWS = 128;
export const DEFAULT_MERGE_VERTICAL_OVERLAP = 0;

export const getMaxTileSide = (config: AppConfig = loadConfig()): number =>
  parseIntegerEnv(config.MAX_TILE_SIDE, "MAX_TILE_SIDE", DEFAULT_MAX_TILE_SIDE, {
    min: 1,
  });

export const getDeviceMaxSurfaceSide = (
  config: AppConfig = loadConfig(),
): number =>
  parseIntegerEnv(
    config.DEVICE_MAX_SURFACE_SIDE,
    "DEVICE_MAX_SURFACE_SIDE",
    DEFAULT_DEVICE_MAX_SURFACE_SIDE,
    { min: 1 },
  );

export const getPngCompressionLevel = (
  config: AppConfig = loadConfig(),
): number =>
  parseIntegerEnv(
    config.PNG_COMPRESSION_LEVEL,
    "PNG_COMPRESSION_LEVEL",
    DEFAULT_PNG_COMPRESSION_LEVEL,
    { min: 0, max: 9 },
  );

export const getMergeYieldRows = (config: AppConfig = loadConfig()): number =>
  parseIntegerEnv(
    config.MERGE_YIELD_ROWS,
    "MERGE_YIELD_ROWS",
    DEFAULT_MERGE_YIELD_ROWS,
    { min: 1 },
  );

export const getMergeVerticalOverlap = (
  config: AppConfig = loadConfig(),
): number =>
  parseIntegerEnv(
    config.MERGE_VERTICAL_OVERLAP,
    "MERGE_VERTICAL_OVERLAP",
    DEFAULT_MERGE_VERTICAL_OVERLAP,
    { min: 0 },
  );

export const PNG_FILTERS = [
  "none",
  "sub",
  "up",
  "average",
  "paeth",
  "adaptive",
] as const;

export type PngFilter = (typeof PNG_FILTERS)[number];

export const DEFAULT_PNG_FILTER: PngFilter = "adaptive";

const isPngFilter = (value: string): value is PngFilter =>
  PNG_FILTERS.some((filter) => filter === value);

export const getPngFilter = (config: AppConfig = loadConfig()): PngFilter => {
  const value = config.PNG_FILTER?.trim().toLowerCase();

  if (value && isPngFilter(value)) {
    return value;
  }

  return DEFAULT_PNG_FILTER;
};

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogThreshold = (typeof LOG_LEVELS)[number];

export const DEFAULT_LOG_LEVEL: LogThreshold = "info";

const isLogThreshold = (value: string): value is LogThreshold =>
  LOG_LEVELS.some((level) => level === value);

export const getLogLevel = (config: AppConfig = loadConfig()): LogThreshold => {
  const value = config.LOG_LEVEL?.trim().toLowerCase();

  if (value && isLogThreshold(value)) {
    return value;
  }

  if (value === "warning") {
    return "warn";
  }

  return DEFAULT_LOG_LEVEL;
};
