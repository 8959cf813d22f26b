import type { Handedness, TargetRayMode } from "./abi";

export interface RigidTransform {
  /** 4x4, column-major. */
  matrix: Float32Array;
  position: Float32Array;
  /** Quaternion as (x, y, z, w). */
  orientation: Float32Array;
}

export interface View {
  viewPose: RigidTransform;
  projectionMatrix: Float32Array;
  /** x, y, width, height on the frame's framebuffer. */
  viewport: Int32Array;
}

export interface InputSource {
  id: number;
  handedness: Handedness;
  targetRayMode: TargetRayMode;
}

export type FrameViews = readonly [View, View];
