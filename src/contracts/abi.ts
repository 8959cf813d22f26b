/** Errors reported through the error callback. */
export enum XrErrorCode {
  /** The host exposes no WebXR Device API. */
  ApiUnsupported = -2,
  /** The graphics context cannot back an XR layer. */
  GlIncapable = -3,
  /** The requested session mode is not available. */
  SessionUnsupported = -4
}

/** Host-specific codes; never overlap {@link XrErrorCode}. */
export enum HostErrorCode {
  SessionBusy = -5,
  ReferenceSpaceUnavailable = -6,
  SessionRequestFailed = -7
}

export type FacadeErrorCode = XrErrorCode | HostErrorCode;

export enum Handedness {
  None = -1,
  Left = 0,
  Right = 1
}

export enum TargetRayMode {
  Gaze = 0,
  TrackedPointer = 1,
  Screen = 2
}

export enum SessionMode {
  Inline = 0,
  ImmersiveVr = 1,
  ImmersiveAr = 2
}

export enum SessionFeature {
  Local = 0,
  LocalFloor = 1,
  BoundedFloor = 2,
  Unbounded = 3,
  HitTest = 4
}

export enum InputPoseMode {
  Grip = 0,
  TargetRay = 1
}
