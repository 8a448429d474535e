/**
 * 4x4 matrix stored row-major: element (row, col) lives at `row * 4 + col`.
 * Conventions follow OpenGL clip space (right-handed view, z in [-1, 1]).
 */
export type Matrix4 = readonly number[];

export interface PerspectiveCamera {
  kind: "perspective";
  /** Vertical field of view in degrees. */
  fieldOfView: number;
  near: number;
  far: number;
}

export interface OrthographicCamera {
  kind: "orthographic";
  /** Half of the view volume's height in world units. */
  orthographicSize: number;
  near: number;
  far: number;
}

export type CameraDescriptor = PerspectiveCamera | OrthographicCamera;

export interface FrustumBounds {
  left: number;
  right: number;
  bottom: number;
  top: number;
  near: number;
  far: number;
}

export const frustumMatrix = ({
  left: l,
  right: r,
  bottom: b,
  top: t,
  near: n,
  far: f,
}: FrustumBounds): Matrix4 => [
  (2 * n) / (r - l), 0, (r + l) / (r - l), 0,
  0, (2 * n) / (t - b), (t + b) / (t - b), 0,
  0, 0, -(f + n) / (f - n), (-2 * f * n) / (f - n),
  0, 0, -1, 0,
];

export const orthographicMatrix = ({
  left: l,
  right: r,
  bottom: b,
  top: t,
  near: n,
  far: f,
}: FrustumBounds): Matrix4 => [
  2 / (r - l), 0, 0, -(r + l) / (r - l),
  0, 2 / (t - b), 0, -(t + b) / (t - b),
  0, 0, -2 / (f - n), -(f + n) / (f - n),
  0, 0, 0, 1,
];

export const lerp = (from: number, to: number, amount: number) =>
  from + (to - from) * amount;
