import type {
  XrEye,
  XrHandednessName,
  XrReferenceSpaceType,
  XrSessionModeName,
  XrTargetRayModeName,
  XrVisibilityState
} from "../contracts/xr";

/** Opaque host space handle (`XRSpace`). */
export type XrSpaceLike = object;

export interface XrPointLike {
  x: number;
  y: number;
  z: number;
  w: number;
}

export interface XrRigidTransformLike {
  matrix?: ArrayLike<number> | null;
  position: XrPointLike;
  orientation: XrPointLike;
}

export interface XrPoseLike {
  transform: XrRigidTransformLike;
}

export interface XrViewLike {
  eye: XrEye;
  projectionMatrix: ArrayLike<number>;
  transform: XrRigidTransformLike;
}

export interface XrViewerPoseLike extends XrPoseLike {
  views: readonly XrViewLike[];
}

export interface XrFrameLike {
  getViewerPose(referenceSpace: XrSpaceLike): XrViewerPoseLike | null | undefined;
  getPose(space: XrSpaceLike, baseSpace: XrSpaceLike): XrPoseLike | null | undefined;
}

export interface XrInputSourceLike {
  handedness: XrHandednessName;
  targetRayMode: XrTargetRayModeName;
  targetRaySpace: XrSpaceLike;
  gripSpace?: XrSpaceLike | null;
}

/**
 * Union of the session event shapes the facade listens to: input source
 * events carry `inputSource`, `inputsourceschange` carries `added`/`removed`.
 */
export interface XrSessionEventLike {
  inputSource?: XrInputSourceLike;
  added?: readonly XrInputSourceLike[];
  removed?: readonly XrInputSourceLike[];
}

export type XrSessionListener = (event: XrSessionEventLike) => void;

export type XrFrameRequestCallback = (time: number, frame: XrFrameLike) => void;

export interface XrViewportLike {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface XrWebGlLayerLike {
  /** `null` for the default framebuffer. */
  framebuffer: object | null;
  framebufferWidth: number;
  framebufferHeight: number;
  getViewport(view: XrViewLike): XrViewportLike | null | undefined;
}

export interface XrRenderStateInitLike {
  baseLayer?: XrWebGlLayerLike;
  depthNear?: number;
  depthFar?: number;
}

export interface XrSessionInitLike {
  requiredFeatures?: string[];
  optionalFeatures?: string[];
}

export interface XrSessionLike {
  readonly inputSources: readonly XrInputSourceLike[];
  readonly visibilityState?: XrVisibilityState;
  end(): Promise<void>;
  addEventListener(type: string, listener: XrSessionListener): void;
  removeEventListener(type: string, listener: XrSessionListener): void;
  requestReferenceSpace(type: XrReferenceSpaceType): Promise<XrSpaceLike>;
  requestAnimationFrame(callback: XrFrameRequestCallback): number;
  cancelAnimationFrame(handle: number): void;
  updateRenderState(state: XrRenderStateInitLike): void;
}

export interface XrSystemLike {
  isSessionSupported(mode: XrSessionModeName): Promise<boolean>;
  requestSession(mode: XrSessionModeName, init?: XrSessionInitLike): Promise<XrSessionLike>;
}

/** The caller's rendering context (a `WebGLRenderingContext` in browsers). */
export interface GraphicsContextLike {
  makeXRCompatible(): Promise<void>;
}

export interface XrHost {
  xr: XrSystemLike | null;
  createWebGlLayer(session: XrSessionLike, context: GraphicsContextLike): XrWebGlLayerLike;
}

type XrWebGlLayerConstructor = new (
  session: XrSessionLike,
  context: GraphicsContextLike
) => XrWebGlLayerLike;

interface BrowserXrGlobals {
  navigator?: { xr?: XrSystemLike };
  XRWebGLLayer?: XrWebGlLayerConstructor;
}

function getBrowserGlobals(): BrowserXrGlobals {
  return globalThis as typeof globalThis & BrowserXrGlobals;
}

export function resolveBrowserHost(): XrHost {
  const globals = getBrowserGlobals();

  return {
    xr: globals.navigator?.xr ?? null,
    createWebGlLayer(session, context) {
      const LayerConstructor = globals.XRWebGLLayer;
      if (!LayerConstructor) {
        throw new Error("XRWebGLLayer is not available in this environment.");
      }
      return new LayerConstructor(session, context);
    }
  };
}

export function isGraphicsContextLike(value: unknown): value is GraphicsContextLike {
  if (typeof value !== "object" || value === null || !("makeXRCompatible" in value)) {
    return false;
  }
  return typeof value.makeXRCompatible === "function";
}
