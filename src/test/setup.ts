import {
  DEFAULT_DEVICE_MAX_SURFACE_SIDE,
  DEFAULT_MAX_TILE_SIDE,
  DEFAULT_MERGE_VERTICAL_OVERLAP,
  DEFAULT_MERGE_YIELD_ROWS,
  DEFAULT_PNG_COMPRESSION_LEVEL,
  DEFAULT_PNG_FILTER,
  loadConfig,
  resetConfigCache,
} from "../config";
import { createLogger } from "../utils/logger";
import { createMetrics } from "../utils/metrics";

export const DEFAULT_ENV = {
  LOG_LEVEL: "silent",
  MAX_TILE_SIDE: String(DEFAULT_MAX_TILE_SIDE),
  DEVICE_MAX_SURFACE_SIDE: String(DEFAULT_DEVICE_MAX_SURFACE_SIDE),
  PNG_COMPRESSION_LEVEL: String(DEFAULT_PNG_COMPRESSION_LEVEL),
  PNG_FILTER: DEFAULT_PNG_FILTER,
  MERGE_YIELD_ROWS: String(DEFAULT_MERGE_YIELD_ROWS),
  MERGE_VERTICAL_OVERLAP: String(DEFAULT_MERGE_VERTICAL_OVERLAP),
};

export type EnvOverrides = Partial<Record<keyof typeof DEFAULT_ENV, string>>;

export const applyTestEnv = (overrides: EnvOverrides = {}) => {
  const merged = { ...DEFAULT_ENV, ...overrides };

  Object.keys(DEFAULT_ENV).forEach((key) => {
    delete process.env[key];
  });

  for (const [key, value] of Object.entries(merged)) {
    process.env[key] = value;
  }

  resetConfigCache();
  return merged;
};

export const loadTestConfig = (overrides: EnvOverrides = {}) => {
  const env = applyTestEnv(overrides);
  resetConfigCache();
  return loadConfig(env);
};

export const quietLogger = createLogger({}, "silent");
export const quietMetrics = createMetrics(quietLogger);
