import type { FacadeErrorCode, SessionMode } from "./abi";
import type { InputPoseMissReason, XrFacadeState } from "./xr";

export interface XrErrorEnvelope {
  code: FacadeErrorCode;
  message: string;
  recoverable: boolean;
  timestampMs: number;
  details?: Record<string, unknown>;
}

export interface FacadeEventMap {
  "xr/state": {
    state: XrFacadeState;
    mode: SessionMode | null;
    timestampMs: number;
  };
  "xr/error": XrErrorEnvelope;
  "input/pose-miss": {
    sourceId: number;
    reason: InputPoseMissReason;
    timestampMs: number;
  };
}

export type FacadeEventName = keyof FacadeEventMap;
