import { Handedness, TargetRayMode } from "../contracts/abi";
import type { InputSource, RigidTransform, View } from "../contracts/records";
import { createRigidTransform, createView } from "../xr-core/pose";

const FLOAT_SIZE = 4;
const INT_SIZE = 4;

export const RIGID_TRANSFORM_LAYOUT = {
  matrix: 0,
  position: 16 * FLOAT_SIZE,
  orientation: 19 * FLOAT_SIZE,
  size: 23 * FLOAT_SIZE
} as const;

export const VIEW_LAYOUT = {
  viewPose: 0,
  projectionMatrix: RIGID_TRANSFORM_LAYOUT.size,
  viewport: RIGID_TRANSFORM_LAYOUT.size + 16 * FLOAT_SIZE,
  size: RIGID_TRANSFORM_LAYOUT.size + 16 * FLOAT_SIZE + 4 * INT_SIZE
} as const;

export const INPUT_SOURCE_LAYOUT = {
  id: 0,
  handedness: INT_SIZE,
  targetRayMode: 2 * INT_SIZE,
  size: 3 * INT_SIZE
} as const;

/** WebAssembly memory is little-endian. */
const LITTLE_ENDIAN = true;

function writeFloats(view: DataView, byteOffset: number, values: ArrayLike<number>, count: number): void {
  for (let i = 0; i < count; i++) {
    view.setFloat32(byteOffset + i * FLOAT_SIZE, values[i], LITTLE_ENDIAN);
  }
}

function readFloats(view: DataView, byteOffset: number, target: Float32Array): void {
  for (let i = 0; i < target.length; i++) {
    target[i] = view.getFloat32(byteOffset + i * FLOAT_SIZE, LITTLE_ENDIAN);
  }
}

export function writeRigidTransform(view: DataView, byteOffset: number, transform: RigidTransform): void {
  writeFloats(view, byteOffset + RIGID_TRANSFORM_LAYOUT.matrix, transform.matrix, 16);
  writeFloats(view, byteOffset + RIGID_TRANSFORM_LAYOUT.position, transform.position, 3);
  writeFloats(view, byteOffset + RIGID_TRANSFORM_LAYOUT.orientation, transform.orientation, 4);
}

export function readRigidTransform(
  view: DataView,
  byteOffset: number,
  target: RigidTransform = createRigidTransform()
): RigidTransform {
  readFloats(view, byteOffset + RIGID_TRANSFORM_LAYOUT.matrix, target.matrix);
  readFloats(view, byteOffset + RIGID_TRANSFORM_LAYOUT.position, target.position);
  readFloats(view, byteOffset + RIGID_TRANSFORM_LAYOUT.orientation, target.orientation);
  return target;
}

export function writeView(view: DataView, byteOffset: number, source: View): void {
  writeRigidTransform(view, byteOffset + VIEW_LAYOUT.viewPose, source.viewPose);
  writeFloats(view, byteOffset + VIEW_LAYOUT.projectionMatrix, source.projectionMatrix, 16);
  for (let i = 0; i < 4; i++) {
    view.setInt32(byteOffset + VIEW_LAYOUT.viewport + i * INT_SIZE, source.viewport[i], LITTLE_ENDIAN);
  }
}

export function readView(view: DataView, byteOffset: number, target: View = createView()): View {
  readRigidTransform(view, byteOffset + VIEW_LAYOUT.viewPose, target.viewPose);
  readFloats(view, byteOffset + VIEW_LAYOUT.projectionMatrix, target.projectionMatrix);
  for (let i = 0; i < 4; i++) {
    target.viewport[i] = view.getInt32(byteOffset + VIEW_LAYOUT.viewport + i * INT_SIZE, LITTLE_ENDIAN);
  }
  return target;
}

/** Writes `views[0..count)` as a contiguous array; returns the bytes written. */
export function writeViews(
  view: DataView,
  byteOffset: number,
  views: readonly View[],
  count: number = views.length
): number {
  const written = Math.min(count, views.length);
  for (let i = 0; i < written; i++) {
    writeView(view, byteOffset + i * VIEW_LAYOUT.size, views[i]);
  }
  return written * VIEW_LAYOUT.size;
}

export function writeInputSource(view: DataView, byteOffset: number, source: InputSource): void {
  view.setInt32(byteOffset + INPUT_SOURCE_LAYOUT.id, source.id, LITTLE_ENDIAN);
  view.setInt32(byteOffset + INPUT_SOURCE_LAYOUT.handedness, source.handedness, LITTLE_ENDIAN);
  view.setInt32(byteOffset + INPUT_SOURCE_LAYOUT.targetRayMode, source.targetRayMode, LITTLE_ENDIAN);
}

function toHandedness(value: number): Handedness {
  switch (value) {
    case Handedness.Left:
      return Handedness.Left;
    case Handedness.Right:
      return Handedness.Right;
    default:
      return Handedness.None;
  }
}

function toTargetRayMode(value: number): TargetRayMode {
  switch (value) {
    case TargetRayMode.TrackedPointer:
      return TargetRayMode.TrackedPointer;
    case TargetRayMode.Screen:
      return TargetRayMode.Screen;
    default:
      return TargetRayMode.Gaze;
  }
}

export function readInputSource(view: DataView, byteOffset: number): InputSource {
  return {
    id: view.getInt32(byteOffset + INPUT_SOURCE_LAYOUT.id, LITTLE_ENDIAN),
    handedness: toHandedness(view.getInt32(byteOffset + INPUT_SOURCE_LAYOUT.handedness, LITTLE_ENDIAN)),
    targetRayMode: toTargetRayMode(view.getInt32(byteOffset + INPUT_SOURCE_LAYOUT.targetRayMode, LITTLE_ENDIAN))
  };
}
