import { Handedness, SessionFeature, SessionMode, TargetRayMode } from "../contracts/abi";
import type {
  XrFeatureName,
  XrHandednessName,
  XrReferenceSpaceType,
  XrSessionModeName,
  XrTargetRayModeName
} from "../contracts/xr";

const SESSION_MODE_NAMES: Record<SessionMode, XrSessionModeName> = {
  [SessionMode.Inline]: "inline",
  [SessionMode.ImmersiveVr]: "immersive-vr",
  [SessionMode.ImmersiveAr]: "immersive-ar"
};

const FEATURE_NAMES: Record<SessionFeature, XrFeatureName> = {
  [SessionFeature.Local]: "local",
  [SessionFeature.LocalFloor]: "local-floor",
  [SessionFeature.BoundedFloor]: "bounded-floor",
  [SessionFeature.Unbounded]: "unbounded",
  [SessionFeature.HitTest]: "hit-test"
};

const HANDEDNESS_CODES: Record<XrHandednessName, Handedness> = {
  none: Handedness.None,
  left: Handedness.Left,
  right: Handedness.Right
};

const TARGET_RAY_MODE_CODES: Record<XrTargetRayModeName, TargetRayMode> = {
  gaze: TargetRayMode.Gaze,
  "tracked-pointer": TargetRayMode.TrackedPointer,
  screen: TargetRayMode.Screen,
  "transient-pointer": TargetRayMode.Screen
};

export function sessionModeName(mode: SessionMode): XrSessionModeName {
  return SESSION_MODE_NAMES[mode];
}

export function isSessionMode(value: number): value is SessionMode {
  return value in SESSION_MODE_NAMES;
}

export function isImmersiveMode(mode: SessionMode): boolean {
  return mode !== SessionMode.Inline;
}

export function featureName(feature: SessionFeature): XrFeatureName {
  return FEATURE_NAMES[feature];
}

export function isSessionFeature(value: number): value is SessionFeature {
  return value in FEATURE_NAMES;
}

export function handednessCode(name: XrHandednessName): Handedness {
  return HANDEDNESS_CODES[name] ?? Handedness.None;
}

export function targetRayModeCode(name: XrTargetRayModeName): TargetRayMode {
  return TARGET_RAY_MODE_CODES[name] ?? TargetRayMode.Gaze;
}

export function isReferenceSpaceFeature(name: XrFeatureName): name is XrReferenceSpaceType {
  return name !== "hit-test";
}
