export interface Resolution {
  readonly width: number;
  readonly height: number;
}

export const MAX_CATALOG_WIDTH = 131_072;
export const DEFAULT_MAX_THOUSAND_PIXELS = 132;

export const createResolution = (width: number, height: number): Resolution =>
  Object.freeze({ width, height });

export const formatResolution = (resolution: Resolution): string =>
  `${resolution.width} x ${resolution.height}`;

// 720p up to 131k, ascending.
export const COMMON_RESOLUTIONS: readonly Resolution[] = Object.freeze(
  (
    [
      [1280, 720],
      [1920, 1080],
      [2048, 1152],
      [2560, 1440],
      [3840, 2160],
      [4096, 2160],
      [5120, 2880],
      [7680, 4320],
      [8192, 4320],
      [10240, 5760],
      [15360, 8640],
      [16384, 8640],
      [20480, 11520],
      [30720, 17280],
      [32768, 17280],
      [40960, 21600],
      [61440, 32400],
      [65536, 32768],
      [81920, 40960],
      [102400, 51200],
      [131072, 65536],
    ] as const
  ).map(([width, height]) => createResolution(width, height)),
);

/**
 * Catalog entries no wider than `maxThousandPixels * 1000`, never beyond
 * 131072, in catalog order.
 */
export const listCommonResolutions = (
  maxThousandPixels: number = DEFAULT_MAX_THOUSAND_PIXELS,
): Resolution[] => {
  const limit = Math.min(maxThousandPixels * 1000, MAX_CATALOG_WIDTH);
  return COMMON_RESOLUTIONS.filter((resolution) => resolution.width <= limit);
};
