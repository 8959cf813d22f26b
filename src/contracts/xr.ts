export type XrFacadeState =
  | "uninitialized"
  | "idle"
  | "requested"
  | "active"
  | "blurred"
  | "ended";

export type XrSessionModeName = "inline" | "immersive-vr" | "immersive-ar";

export type XrReferenceSpaceType =
  | "viewer"
  | "local"
  | "local-floor"
  | "bounded-floor"
  | "unbounded";

export type XrFeatureName = XrReferenceSpaceType | "hit-test";

export type XrHandednessName = "none" | "left" | "right";

export type XrTargetRayModeName = "gaze" | "tracked-pointer" | "screen" | "transient-pointer";

export type XrVisibilityState = "visible" | "visible-blurred" | "hidden";

export type XrEye = "none" | "left" | "right";

export type InputPoseMissReason = "not-in-frame" | "unknown-source" | "no-space" | "no-pose";
