import type { FacadeErrorCode, SessionMode } from "./abi";
import type { FrameViews, InputSource, RigidTransform } from "./records";

/**
 * Called once per host frame while a session is active.
 *
 * `headPose` and `views` are reused between frames; copy them to retain.
 * Only `views[0..viewCount)` are valid.
 */
export type FrameCallback<TUserData> = (
  userData: TUserData,
  framebufferId: number,
  time: number,
  headPose: RigidTransform,
  views: FrameViews,
  viewCount: number
) => void;

export type SessionCallback<TUserData> = (userData: TUserData, mode: SessionMode) => void;

export type ErrorCallback<TUserData> = (userData: TUserData, error: FacadeErrorCode) => void;

export type SessionSupportedCallback = (mode: SessionMode, supported: 0 | 1) => void;

/** `inputSource` is only valid for the duration of the call. */
export type InputCallback<TUserData> = (inputSource: InputSource, userData: TUserData) => void;
