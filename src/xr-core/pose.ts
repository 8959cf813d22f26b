import { Matrix4, Quaternion, Vector3 } from "three";

import { Handedness, TargetRayMode } from "../contracts/abi";
import type { InputSource, RigidTransform, View } from "../contracts/records";
import type { XrPointLike, XrRigidTransformLike } from "./host";

const IDENTITY_MATRIX: readonly number[] = [1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1, 0, 0, 0, 0, 1];

const UNIT_SCALE = new Vector3(1, 1, 1);

// Scratch objects; every function below is synchronous.
const scratchMatrix = new Matrix4();
const scratchPosition = new Vector3();
const scratchOrientation = new Quaternion();

export function createRigidTransform(): RigidTransform {
  return {
    matrix: Float32Array.from(IDENTITY_MATRIX),
    position: new Float32Array(3),
    orientation: Float32Array.from([0, 0, 0, 1])
  };
}

export function createView(): View {
  return {
    viewPose: createRigidTransform(),
    projectionMatrix: Float32Array.from(IDENTITY_MATRIX),
    viewport: new Int32Array(4)
  };
}

export function createInputSource(): InputSource {
  return {
    id: -1,
    handedness: Handedness.None,
    targetRayMode: TargetRayMode.Gaze
  };
}

export function resetRigidTransform(target: RigidTransform): RigidTransform {
  target.matrix.set(IDENTITY_MATRIX);
  target.position.fill(0);
  target.orientation.set([0, 0, 0, 1]);
  return target;
}

export function copyRigidTransform(target: RigidTransform, source: RigidTransform): RigidTransform {
  target.matrix.set(source.matrix);
  target.position.set(source.position);
  target.orientation.set(source.orientation);
  return target;
}

export function copyView(target: View, source: View): View {
  copyRigidTransform(target.viewPose, source.viewPose);
  target.projectionMatrix.set(source.projectionMatrix);
  target.viewport.set(source.viewport);
  return target;
}

/** Writes translate(position) · rotate(orientation) into `target.matrix`. */
export function composeRigidTransform(
  target: RigidTransform,
  position: ArrayLike<number>,
  orientation: ArrayLike<number>
): RigidTransform {
  target.position.set([position[0], position[1], position[2]]);
  target.orientation.set([orientation[0], orientation[1], orientation[2], orientation[3]]);

  scratchPosition.set(position[0], position[1], position[2]);
  scratchOrientation.set(orientation[0], orientation[1], orientation[2], orientation[3]);
  scratchMatrix.compose(scratchPosition, scratchOrientation, UNIT_SCALE);
  target.matrix.set(scratchMatrix.elements);
  return target;
}

export function isRigidTransformConsistent(transform: RigidTransform, epsilon = 1e-4): boolean {
  scratchPosition.fromArray(Array.from(transform.position));
  scratchOrientation.fromArray(Array.from(transform.orientation));
  scratchMatrix.compose(scratchPosition, scratchOrientation, UNIT_SCALE);

  const expected = scratchMatrix.elements;
  for (let i = 0; i < 16; i++) {
    if (Math.abs(expected[i] - transform.matrix[i]) > epsilon) {
      return false;
    }
  }
  return true;
}

function pointToArray(point: XrPointLike, size: 3 | 4): number[] {
  return size === 3 ? [point.x, point.y, point.z] : [point.x, point.y, point.z, point.w];
}

export function fillFromHostTransform(target: RigidTransform, source: XrRigidTransformLike): RigidTransform {
  const position = pointToArray(source.position, 3);
  const orientation = pointToArray(source.orientation, 4);

  if (!source.matrix || source.matrix.length !== 16) {
    return composeRigidTransform(target, position, orientation);
  }

  target.matrix.set(source.matrix);
  target.position.set(position);
  target.orientation.set(orientation);
  return target;
}

/**
 * Symmetric perspective projection, column-major, mapping depth to [-1, 1].
 */
export function fillPerspectiveProjection(
  target: Float32Array,
  verticalFovRadians: number,
  aspect: number,
  near: number,
  far: number
): Float32Array {
  const top = near * Math.tan(verticalFovRadians / 2);
  const right = top * aspect;
  scratchMatrix.makePerspective(-right, right, top, -top, near, far);
  target.set(scratchMatrix.elements);
  return target;
}
