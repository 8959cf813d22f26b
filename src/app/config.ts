import type { XrReferenceSpaceType } from "../contracts/xr";
import type { GraphicsContextLike, XrHost } from "../xr-core/host";
import { resolveBrowserHost } from "../xr-core/host";
import type { LogLevel, Logger } from "./logger";
import { createConsoleLogger } from "./logger";

export const DEFAULT_DEPTH_NEAR = 0.1;
export const DEFAULT_DEPTH_FAR = 1000;
export const MIN_DEPTH_NEAR = 0.01;
export const MIN_DEPTH_SPAN = 0.01;
export const DEFAULT_MAX_INPUT_SOURCES = 16;
export const MAX_INPUT_SOURCES_LIMIT = 256;

const DEFAULT_FALLBACK_REFERENCE_SPACES: XrReferenceSpaceType[] = ["local", "viewer"];

export interface XrFacadeOptions {
  /** Host XR runtime. Defaults to the browser's `navigator.xr`. */
  host?: XrHost;
  /** Context the session's layer renders into. */
  graphicsContext?: GraphicsContextLike | null;
  logger?: Logger;
  /** Ignored when `logger` is given. */
  logLevel?: LogLevel;
  depthNear?: number;
  depthFar?: number;
  maxInputSources?: number;
  /** Tried after the requested features' reference spaces. */
  fallbackReferenceSpaces?: XrReferenceSpaceType[];
}

export interface XrFacadeConfig {
  host: XrHost;
  graphicsContext: GraphicsContextLike | null;
  logger: Logger;
  depthNear: number;
  depthFar: number;
  maxInputSources: number;
  fallbackReferenceSpaces: XrReferenceSpaceType[];
}

export interface ClampedDepthRange {
  near: number;
  far: number;
  clamped: boolean;
}

export function clampDepthRange(near: number, far: number): ClampedDepthRange {
  const safeNear = Number.isFinite(near) && near > 0 ? near : MIN_DEPTH_NEAR;
  const safeFar = Number.isFinite(far) && far > safeNear ? far : safeNear + MIN_DEPTH_SPAN;

  return {
    near: safeNear,
    far: safeFar,
    clamped: safeNear !== near || safeFar !== far
  };
}

export function resolveXrFacadeConfig(options: XrFacadeOptions = {}): XrFacadeConfig {
  const depth = clampDepthRange(
    options.depthNear ?? DEFAULT_DEPTH_NEAR,
    options.depthFar ?? DEFAULT_DEPTH_FAR
  );
  const maxInputSources =
    options.maxInputSources !== undefined && options.maxInputSources >= 1
      ? Math.min(Math.floor(options.maxInputSources), MAX_INPUT_SOURCES_LIMIT)
      : DEFAULT_MAX_INPUT_SOURCES;

  return {
    host: options.host ?? resolveBrowserHost(),
    graphicsContext: options.graphicsContext ?? null,
    logger: options.logger ?? createConsoleLogger("xr-facade", options.logLevel),
    depthNear: depth.near,
    depthFar: depth.far,
    maxInputSources,
    fallbackReferenceSpaces: options.fallbackReferenceSpaces ?? DEFAULT_FALLBACK_REFERENCE_SPACES
  };
}
