import { z } from "zod";
import { InvalidCaptureRequestError, InvalidDimensionsError } from "./errors";
import type { CameraDescriptor } from "./projection";

export const SUPERSAMPLE_FACTOR = 2;

const clipPlanes = {
  near: z.number().positive({ message: "near must be greater than 0" }),
  far: z.number().positive({ message: "far must be greater than 0" }),
};

const perspectiveCameraSchema = z.object({
  kind: z.literal("perspective"),
  fieldOfView: z
    .number()
    .gt(0, "fieldOfView must be greater than 0 degrees")
    .lt(180, "fieldOfView must be less than 180 degrees"),
  ...clipPlanes,
});

const orthographicCameraSchema = z.object({
  kind: z.literal("orthographic"),
  orthographicSize: z
    .number()
    .positive({ message: "orthographicSize must be greater than 0" }),
  ...clipPlanes,
});

export const cameraSchema = z
  .discriminatedUnion("kind", [perspectiveCameraSchema, orthographicCameraSchema])
  .superRefine((camera, ctx) => {
    if (camera.far <= camera.near) {
      ctx.addIssue({
        code: "custom",
        message: "far must be greater than near",
        path: ["far"],
      });
    }
  });

const dimensionSchema = z
  .number()
  .int({ message: "dimensions must be whole pixels" })
  .positive({ message: "dimensions must be greater than 0" });

export const captureRequestSchema = z.object({
  camera: cameraSchema,
  width: dimensionSchema,
  height: dimensionSchema,
  supersample: z.boolean().default(false),
  transparentBackground: z.boolean().default(false),
  compressionLevel: z
    .number()
    .int({ message: "compressionLevel must be an integer" })
    .min(0, "compressionLevel must be between 0 and 9")
    .max(9, "compressionLevel must be between 0 and 9")
    .optional(),
});

export type CaptureRequestInput = z.input<typeof captureRequestSchema>;

export interface CaptureRequest {
  camera: CameraDescriptor;
  width: number;
  height: number;
  supersample: boolean;
  transparentBackground: boolean;
  compressionLevel?: number;
}

const DIMENSION_KEYS = new Set<PropertyKey>(["width", "height"]);

const readDimension = (payload: unknown, key: "width" | "height"): number => {
  if (!payload || typeof payload !== "object" || !(key in payload)) {
    return Number.NaN;
  }

  const value: unknown = Reflect.get(payload, key);
  return typeof value === "number" ? value : Number.NaN;
};

export const parseCaptureRequest = (payload: unknown): CaptureRequest => {
  const result = captureRequestSchema.safeParse(payload);

  if (!result.success) {
    const { issues } = result.error;
    const dimensionIssue = issues.some(
      (issue) => issue.path.length === 1 && DIMENSION_KEYS.has(issue.path[0]),
    );

    if (dimensionIssue) {
      throw new InvalidDimensionsError(
        readDimension(payload, "width"),
        readDimension(payload, "height"),
      );
    }

    throw new InvalidCaptureRequestError(issues);
  }

  return result.data;
};

export const supersampleFactor = (request: Pick<CaptureRequest, "supersample">) =>
  request.supersample ? SUPERSAMPLE_FACTOR : 1;
