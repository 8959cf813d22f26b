import type { InputPoseMode, SessionFeature, SessionMode } from "./abi";
import type {
  ErrorCallback,
  FrameCallback,
  InputCallback,
  SessionCallback,
  SessionSupportedCallback
} from "./callbacks";
import type { FacadeEventMap } from "./events";
import type { InputSource, RigidTransform } from "./records";
import type { XrFacadeState } from "./xr";

export interface FacadeEventBus {
  emit<TEventName extends keyof FacadeEventMap>(
    eventName: TEventName,
    payload: FacadeEventMap[TEventName]
  ): void;
  on<TEventName extends keyof FacadeEventMap>(
    eventName: TEventName,
    handler: (payload: FacadeEventMap[TEventName]) => void
  ): () => void;
}

/** A single feature tag, a list of them, or none. */
export type SessionFeatureRequest = SessionFeature | readonly SessionFeature[] | null;

export interface XrFacadePort {
  readonly events: FacadeEventBus;
  getState(): XrFacadeState;
  init<TUserData>(
    frameCallback: FrameCallback<TUserData>,
    sessionStartCallback: SessionCallback<TUserData>,
    sessionEndCallback: SessionCallback<TUserData>,
    errorCallback: ErrorCallback<TUserData>,
    userData: TUserData
  ): void;
  setSessionBlurCallback<TUserData>(callback: SessionCallback<TUserData> | null, userData: TUserData): void;
  setSessionFocusCallback<TUserData>(callback: SessionCallback<TUserData> | null, userData: TUserData): void;
  setSelectCallback<TUserData>(callback: InputCallback<TUserData> | null, userData: TUserData): void;
  setSelectStartCallback<TUserData>(callback: InputCallback<TUserData> | null, userData: TUserData): void;
  setSelectEndCallback<TUserData>(callback: InputCallback<TUserData> | null, userData: TUserData): void;
  isSessionSupported(mode: SessionMode, supportedCallback: SessionSupportedCallback): void;
  requestSession(
    mode: SessionMode,
    requiredFeatures?: SessionFeatureRequest,
    optionalFeatures?: SessionFeatureRequest
  ): void;
  requestExit(): void;
  setProjectionParams(near: number, far: number): void;
  getInputSources(out: InputSource[], max?: number): number;
  getInputPose(source: InputSource, outPose: RigidTransform, mode?: InputPoseMode): boolean;
}
