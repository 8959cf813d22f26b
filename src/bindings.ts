import type { InputPoseMode, SessionMode } from "./contracts/abi";
import type {
  ErrorCallback,
  FrameCallback,
  InputCallback,
  SessionCallback,
  SessionSupportedCallback
} from "./contracts/callbacks";
import type { SessionFeatureRequest } from "./contracts/integration";
import type { InputSource, RigidTransform } from "./contracts/records";
import { XrFacade } from "./xr-core/facade";

// Free-function surface over one shared facade, created on first use
// against the browser globals.
let sharedFacade: XrFacade | null = null;

export function getXrFacade(): XrFacade {
  if (!sharedFacade) {
    sharedFacade = new XrFacade();
  }
  return sharedFacade;
}

/** Replaces the facade the free functions drive. */
export function installXrFacade(facade: XrFacade): void {
  sharedFacade = facade;
}

export function webxrInit<TUserData>(
  frameCallback: FrameCallback<TUserData>,
  sessionStartCallback: SessionCallback<TUserData>,
  sessionEndCallback: SessionCallback<TUserData>,
  errorCallback: ErrorCallback<TUserData>,
  userData: TUserData
): void {
  getXrFacade().init(frameCallback, sessionStartCallback, sessionEndCallback, errorCallback, userData);
}

export function webxrSetSessionBlurCallback<TUserData>(
  callback: SessionCallback<TUserData> | null,
  userData: TUserData
): void {
  getXrFacade().setSessionBlurCallback(callback, userData);
}

export function webxrSetSessionFocusCallback<TUserData>(
  callback: SessionCallback<TUserData> | null,
  userData: TUserData
): void {
  getXrFacade().setSessionFocusCallback(callback, userData);
}

export function webxrIsSessionSupported(mode: SessionMode, supportedCallback: SessionSupportedCallback): void {
  getXrFacade().isSessionSupported(mode, supportedCallback);
}

/** Must run inside a user activation event handler. */
export function webxrRequestSession(
  mode: SessionMode,
  requiredFeatures: SessionFeatureRequest = null,
  optionalFeatures: SessionFeatureRequest = null
): void {
  getXrFacade().requestSession(mode, requiredFeatures, optionalFeatures);
}

export function webxrRequestExit(): void {
  getXrFacade().requestExit();
}

export function webxrSetProjectionParams(near: number, far: number): void {
  getXrFacade().setProjectionParams(near, far);
}

export function webxrSetSelectCallback<TUserData>(callback: InputCallback<TUserData> | null, userData: TUserData): void {
  getXrFacade().setSelectCallback(callback, userData);
}

export function webxrSetSelectStartCallback<TUserData>(
  callback: InputCallback<TUserData> | null,
  userData: TUserData
): void {
  getXrFacade().setSelectStartCallback(callback, userData);
}

export function webxrSetSelectEndCallback<TUserData>(
  callback: InputCallback<TUserData> | null,
  userData: TUserData
): void {
  getXrFacade().setSelectEndCallback(callback, userData);
}

/** Returns the number of records written to `out`. */
export function webxrGetInputSources(out: InputSource[], max: number = out.length): number {
  return getXrFacade().getInputSources(out, max);
}

/** Only succeeds while a frame callback is running. */
export function webxrGetInputPose(source: InputSource, outPose: RigidTransform, mode?: InputPoseMode): boolean {
  return getXrFacade().getInputPose(source, outPose, mode);
}
