import type { FacadeErrorCode } from "../contracts/abi";
import { HostErrorCode, InputPoseMode, SessionMode, XrErrorCode } from "../contracts/abi";
import type {
  ErrorCallback,
  FrameCallback,
  InputCallback,
  SessionCallback,
  SessionSupportedCallback
} from "../contracts/callbacks";
import type { InputPoseMissReason, XrFacadeState, XrFeatureName, XrReferenceSpaceType } from "../contracts/xr";
import type { FacadeEventBus, SessionFeatureRequest, XrFacadePort } from "../contracts/integration";
import type { FrameViews, InputSource, RigidTransform } from "../contracts/records";
import { createFacadeEventBus } from "../app/event-bus";
import type { XrFacadeConfig, XrFacadeOptions } from "../app/config";
import { clampDepthRange, resolveXrFacadeConfig } from "../app/config";
import type { Logger } from "../app/logger";
import {
  featureName,
  isImmersiveMode,
  isReferenceSpaceFeature,
  isSessionFeature,
  isSessionMode,
  sessionModeName
} from "./codes";
import { FramebufferRegistry } from "./framebuffers";
import type {
  GraphicsContextLike,
  XrFrameLike,
  XrSessionEventLike,
  XrSessionInitLike,
  XrSessionLike,
  XrSessionListener,
  XrSpaceLike,
  XrSystemLike,
  XrWebGlLayerLike
} from "./host";
import { isGraphicsContextLike } from "./host";
import { InputSourceRegistry } from "./input-registry";
import {
  createInputSource,
  createRigidTransform,
  createView,
  fillFromHostTransform,
  fillPerspectiveProjection,
  resetRigidTransform
} from "./pose";
import { SessionStateMachine } from "./session-state";

const MAX_VIEWS = 2;

const FALLBACK_VERTICAL_FOV = Math.PI / 2;

interface BoundSessionCallbacks {
  frame(framebufferId: number, time: number, headPose: RigidTransform, views: FrameViews, viewCount: number): void;
  start(mode: SessionMode): void;
  end(mode: SessionMode): void;
  error(code: FacadeErrorCode): void;
}

type BoundModeCallback = ((mode: SessionMode) => void) | null;

type BoundInputCallback = ((source: InputSource) => void) | null;

type SelectPhase = "selectstart" | "select" | "selectend";

interface ActiveSession {
  session: XrSessionLike;
  mode: SessionMode;
  layer: XrWebGlLayerLike;
  referenceSpace: XrSpaceLike;
  frameHandle: number | null;
  lastTime: number;
  /** Views delivered by the latest frame; 0 before the first one. */
  viewCount: number;
  exitRequested: boolean;
  listeners: [string, XrSessionListener][];
}

interface FrameScope {
  active: ActiveSession;
  frame: XrFrameLike;
}

class SessionSetupError extends Error {
  readonly code: FacadeErrorCode;

  constructor(code: FacadeErrorCode, message: string) {
    super(message);
    this.name = "SessionSetupError";
    this.code = code;
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toFeatureList(request: SessionFeatureRequest | undefined): number[] {
  if (request === null || request === undefined) {
    return [];
  }
  return typeof request === "number" ? [request] : [...request];
}

export class XrFacade implements XrFacadePort {
  readonly events: FacadeEventBus = createFacadeEventBus();

  private readonly config: XrFacadeConfig;
  private readonly logger: Logger;
  private readonly state = new SessionStateMachine();
  private readonly inputs: InputSourceRegistry;
  private readonly framebuffers = new FramebufferRegistry();
  private readonly headPose = createRigidTransform();
  private readonly views: FrameViews = [createView(), createView()];
  private graphicsContext: GraphicsContextLike | null;
  private callbacks: BoundSessionCallbacks | null = null;
  private blurCallback: BoundModeCallback = null;
  private focusCallback: BoundModeCallback = null;
  private readonly selectCallbacks: Record<SelectPhase, BoundInputCallback> = {
    selectstart: null,
    select: null,
    selectend: null
  };
  private active: ActiveSession | null = null;
  private frameScope: FrameScope | null = null;
  private depthNear: number;
  private depthFar: number;

  constructor(options: XrFacadeOptions = {}) {
    this.config = resolveXrFacadeConfig(options);
    this.logger = this.config.logger;
    this.inputs = new InputSourceRegistry(this.config.maxInputSources);
    this.graphicsContext = isGraphicsContextLike(this.config.graphicsContext)
      ? this.config.graphicsContext
      : null;
    this.depthNear = this.config.depthNear;
    this.depthFar = this.config.depthFar;
  }

  getState(): XrFacadeState {
    return this.state.state;
  }

  getProjectionParams(): { near: number; far: number } {
    return { near: this.depthNear, far: this.depthFar };
  }

  /** Swaps the context used by the next session request. */
  setGraphicsContext(context: GraphicsContextLike | null): void {
    this.graphicsContext = isGraphicsContextLike(context) ? context : null;
  }

  init<TUserData>(
    frameCallback: FrameCallback<TUserData>,
    sessionStartCallback: SessionCallback<TUserData>,
    sessionEndCallback: SessionCallback<TUserData>,
    errorCallback: ErrorCallback<TUserData>,
    userData: TUserData
  ): void {
    if (!this.state.is("uninitialized")) {
      this.logger.warn("init() called more than once; ignoring.");
      return;
    }

    this.callbacks = {
      frame: (framebufferId, time, headPose, views, viewCount) =>
        frameCallback(userData, framebufferId, time, headPose, views, viewCount),
      start: (mode) => sessionStartCallback(userData, mode),
      end: (mode) => sessionEndCallback(userData, mode),
      error: (code) => errorCallback(userData, code)
    };
    this.setState("idle", null);

    if (!this.config.host.xr) {
      this.reportError(XrErrorCode.ApiUnsupported, "WebXR Device API is not available.", false);
      return;
    }

    if (!this.graphicsContext) {
      this.reportError(
        XrErrorCode.GlIncapable,
        "No graphics context able to back an XR layer.",
        true
      );
    }
  }

  setSessionBlurCallback<TUserData>(callback: SessionCallback<TUserData> | null, userData: TUserData): void {
    if (!this.ensureInitialized("setSessionBlurCallback")) {
      return;
    }
    this.blurCallback = callback ? (mode) => callback(userData, mode) : null;
  }

  setSessionFocusCallback<TUserData>(callback: SessionCallback<TUserData> | null, userData: TUserData): void {
    if (!this.ensureInitialized("setSessionFocusCallback")) {
      return;
    }
    this.focusCallback = callback ? (mode) => callback(userData, mode) : null;
  }

  setSelectCallback<TUserData>(callback: InputCallback<TUserData> | null, userData: TUserData): void {
    this.setInputCallback("select", callback, userData);
  }

  setSelectStartCallback<TUserData>(callback: InputCallback<TUserData> | null, userData: TUserData): void {
    this.setInputCallback("selectstart", callback, userData);
  }

  setSelectEndCallback<TUserData>(callback: InputCallback<TUserData> | null, userData: TUserData): void {
    this.setInputCallback("selectend", callback, userData);
  }

  isSessionSupported(mode: SessionMode, supportedCallback: SessionSupportedCallback): void {
    if (!this.ensureInitialized("isSessionSupported")) {
      return;
    }

    void this.probeSessionSupport(this.config.host.xr, mode)
      .then((supported) => supportedCallback(mode, supported ? 1 : 0))
      .catch((error: unknown) => {
        this.logger.error("Session support callback failed.", error);
      });
  }

  requestSession(
    mode: SessionMode,
    requiredFeatures: SessionFeatureRequest = null,
    optionalFeatures: SessionFeatureRequest = null
  ): void {
    if (!this.ensureInitialized("requestSession")) {
      return;
    }

    const xr = this.config.host.xr;
    if (!xr) {
      this.reportError(XrErrorCode.ApiUnsupported, "WebXR Device API is not available.", false);
      return;
    }

    if (!isSessionMode(mode)) {
      this.reportError(XrErrorCode.SessionUnsupported, `Unknown session mode ${String(mode)}.`, true);
      return;
    }

    if (!this.state.is("idle", "ended")) {
      this.reportError(
        HostErrorCode.SessionBusy,
        `Cannot request a session while the facade is ${this.state.state}.`,
        true
      );
      return;
    }

    const context = this.graphicsContext;
    if (!context) {
      this.reportError(XrErrorCode.GlIncapable, "No graphics context able to back an XR layer.", true);
      return;
    }

    const required = this.resolveFeatureNames(requiredFeatures, []);
    const optional = this.resolveFeatureNames(optionalFeatures, required);
    const sessionInit: XrSessionInitLike = {};
    if (required.length > 0) {
      sessionInit.requiredFeatures = required;
    }
    if (optional.length > 0) {
      sessionInit.optionalFeatures = optional;
    }

    this.setState("requested", mode);

    // The host call must happen before the first await to keep user activation.
    void this.startSession(xr, context, mode, sessionInit, [...required, ...optional]).catch(
      (error: unknown) => {
        this.logger.error("Session start callback failed.", error);
      }
    );
  }

  requestExit(): void {
    if (!this.ensureInitialized("requestExit")) {
      return;
    }

    const active = this.active;
    if (!active || active.exitRequested) {
      this.logger.debug("requestExit() with no running session; nothing to do.");
      return;
    }

    active.exitRequested = true;
    void active.session
      .end()
      .then(
        () => this.finishSession(active),
        (error: unknown) => {
          this.logger.warn("Host failed to end the session cleanly.", error);
          this.finishSession(active);
        }
      )
      .catch((error: unknown) => {
        this.logger.error("Session end callback failed.", error);
      });
  }

  setProjectionParams(near: number, far: number): void {
    if (!this.ensureInitialized("setProjectionParams")) {
      return;
    }

    const range = clampDepthRange(near, far);
    if (range.clamped) {
      this.logger.warn("Projection parameters out of range; clamped.", {
        requested: { near, far },
        applied: { near: range.near, far: range.far }
      });
    }

    this.depthNear = range.near;
    this.depthFar = range.far;

    // An ending session rejects render state updates; the next session picks the values up.
    if (this.active && !this.active.exitRequested) {
      this.active.session.updateRenderState({ depthNear: this.depthNear, depthFar: this.depthFar });
    }
  }

  getInputSources(out: InputSource[], max: number = out.length): number {
    if (!this.ensureInitialized("getInputSources")) {
      return 0;
    }

    const active = this.active;
    if (!active) {
      return 0;
    }

    const limit = Number.isFinite(max) ? Math.max(0, Math.floor(max)) : 0;
    let count = 0;
    for (const source of active.session.inputSources) {
      if (count >= limit) {
        break;
      }
      if (this.inputs.register(source) < 0) {
        continue;
      }

      const record = out[count] ?? createInputSource();
      this.inputs.describe(source, record);
      out[count] = record;
      count += 1;
    }

    return count;
  }

  getInputPose(
    source: InputSource,
    outPose: RigidTransform,
    mode: InputPoseMode = InputPoseMode.Grip
  ): boolean {
    if (!this.ensureInitialized("getInputPose")) {
      return false;
    }

    const scope = this.frameScope;
    if (!scope) {
      return this.missInputPose(source.id, "not-in-frame");
    }

    const hostSource = this.inputs.lookup(source.id);
    if (!hostSource) {
      return this.missInputPose(source.id, "unknown-source");
    }

    const space = mode === InputPoseMode.TargetRay ? hostSource.targetRaySpace : hostSource.gripSpace;
    if (!space) {
      return this.missInputPose(source.id, "no-space");
    }

    const pose = scope.frame.getPose(space, scope.active.referenceSpace);
    if (!pose) {
      return this.missInputPose(source.id, "no-pose");
    }

    fillFromHostTransform(outPose, pose.transform);
    return true;
  }

  private async startSession(
    xr: XrSystemLike,
    context: GraphicsContextLike,
    mode: SessionMode,
    sessionInit: XrSessionInitLike,
    requestedFeatures: XrFeatureName[]
  ): Promise<void> {
    const modeName = sessionModeName(mode);

    let session: XrSessionLike;
    try {
      session = await xr.requestSession(modeName, sessionInit);
    } catch (error) {
      this.setState("idle", null);
      this.reportError(
        isImmersiveMode(mode) ? XrErrorCode.SessionUnsupported : HostErrorCode.SessionRequestFailed,
        `Unable to start ${modeName} session: ${describeError(error)}`,
        true
      );
      return;
    }

    let endedDuringSetup = false;
    const onEarlyEnd: XrSessionListener = () => {
      endedDuringSetup = true;
    };
    session.addEventListener("end", onEarlyEnd);

    let layer: XrWebGlLayerLike;
    let referenceSpace: XrSpaceLike;
    try {
      layer = await this.createLayer(session, context);
      session.updateRenderState({
        baseLayer: layer,
        depthNear: this.depthNear,
        depthFar: this.depthFar
      });
      referenceSpace = await this.resolveReferenceSpace(session, requestedFeatures);
      if (endedDuringSetup) {
        throw new SessionSetupError(
          HostErrorCode.SessionRequestFailed,
          `The ${modeName} session ended before it started.`
        );
      }
    } catch (error) {
      if (!endedDuringSetup) {
        await session.end().catch((endError: unknown) => {
          this.logger.warn("Host failed to end the abandoned session.", endError);
        });
      }
      this.setState("idle", null);
      const code = error instanceof SessionSetupError ? error.code : HostErrorCode.SessionRequestFailed;
      this.reportError(code, describeError(error), true);
      return;
    } finally {
      session.removeEventListener("end", onEarlyEnd);
    }

    const active: ActiveSession = {
      session,
      mode,
      layer,
      referenceSpace,
      frameHandle: null,
      lastTime: 0,
      viewCount: 0,
      exitRequested: false,
      listeners: []
    };
    this.attachSessionListeners(active);
    for (const source of session.inputSources) {
      this.inputs.register(source);
    }

    this.active = active;
    this.setState("active", mode);
    this.logger.info("Session started.", { mode: modeName, features: requestedFeatures });
    // Sessions may be granted already blurred or hidden.
    this.handleVisibilityChange(active);

    active.frameHandle = session.requestAnimationFrame((time, frame) => this.deliverFrame(active, time, frame));
    this.callbacks?.start(mode);
  }

  private async createLayer(session: XrSessionLike, context: GraphicsContextLike): Promise<XrWebGlLayerLike> {
    try {
      await context.makeXRCompatible();
      return this.config.host.createWebGlLayer(session, context);
    } catch (error) {
      throw new SessionSetupError(
        XrErrorCode.GlIncapable,
        `Unable to make the graphics context XR compatible: ${describeError(error)}`
      );
    }
  }

  private async resolveReferenceSpace(
    session: XrSessionLike,
    requestedFeatures: XrFeatureName[]
  ): Promise<XrSpaceLike> {
    const candidates: XrReferenceSpaceType[] = [];
    for (const name of [...requestedFeatures, ...this.config.fallbackReferenceSpaces]) {
      if (isReferenceSpaceFeature(name) && !candidates.includes(name)) {
        candidates.push(name);
      }
    }

    for (const referenceType of candidates) {
      try {
        const space = await session.requestReferenceSpace(referenceType);
        this.logger.debug("Resolved reference space.", { type: referenceType });
        return space;
      } catch (error) {
        this.logger.debug("Reference space unavailable.", { type: referenceType, reason: describeError(error) });
        continue;
      }
    }

    throw new SessionSetupError(
      HostErrorCode.ReferenceSpaceUnavailable,
      `Unable to get any of the reference spaces: ${candidates.join(", ")}.`
    );
  }

  private attachSessionListeners(active: ActiveSession): void {
    const listen = (type: string, listener: XrSessionListener): void => {
      active.session.addEventListener(type, listener);
      active.listeners.push([type, listener]);
    };

    listen("end", () => this.finishSession(active));
    listen("visibilitychange", () => this.handleVisibilityChange(active));
    listen("inputsourceschange", (event) => this.handleInputSourcesChange(event));
    for (const phase of ["selectstart", "select", "selectend"] as const) {
      listen(phase, (event) => this.dispatchSelect(phase, event));
    }
  }

  private deliverFrame(active: ActiveSession, time: number, frame: XrFrameLike): void {
    if (this.active !== active) {
      return;
    }

    active.frameHandle = active.session.requestAnimationFrame((nextTime, nextFrame) =>
      this.deliverFrame(active, nextTime, nextFrame)
    );

    const callbacks = this.callbacks;
    if (active.exitRequested || !callbacks) {
      return;
    }

    const frameTime = Math.max(active.lastTime, Math.floor(time));
    active.lastTime = frameTime;
    const viewCount = this.fillFrameViews(active, frame);
    const framebufferId = this.framebuffers.nameOf(active.layer.framebuffer);

    this.frameScope = { active, frame };
    try {
      callbacks.frame(framebufferId, frameTime, this.headPose, this.views, viewCount);
    } finally {
      this.frameScope = null;
    }
  }

  private fillFrameViews(active: ActiveSession, frame: XrFrameLike): number {
    const viewerPose = frame.getViewerPose(active.referenceSpace);

    if (!viewerPose || viewerPose.views.length === 0) {
      if (active.viewCount > 0) {
        return active.viewCount;
      }
      resetRigidTransform(this.headPose);
      this.fillFallbackView(active.layer);
      active.viewCount = 1;
      return 1;
    }

    fillFromHostTransform(this.headPose, viewerPose.transform);

    const viewCount = Math.min(viewerPose.views.length, MAX_VIEWS);
    for (let i = 0; i < viewCount; i++) {
      const hostView = viewerPose.views[i];
      const view = this.views[i];

      fillFromHostTransform(view.viewPose, hostView.transform);
      if (hostView.projectionMatrix.length === 16) {
        view.projectionMatrix.set(hostView.projectionMatrix);
      } else {
        this.fillFallbackProjection(view.projectionMatrix, active.layer);
      }

      const viewport = active.layer.getViewport(hostView);
      if (viewport) {
        view.viewport.set([viewport.x, viewport.y, viewport.width, viewport.height]);
      } else {
        view.viewport.set([0, 0, active.layer.framebufferWidth, active.layer.framebufferHeight]);
      }
    }

    active.viewCount = viewCount;
    return viewCount;
  }

  private fillFallbackView(layer: XrWebGlLayerLike): void {
    const view = this.views[0];
    resetRigidTransform(view.viewPose);
    view.viewport.set([0, 0, layer.framebufferWidth, layer.framebufferHeight]);
    this.fillFallbackProjection(view.projectionMatrix, layer);
  }

  private fillFallbackProjection(target: Float32Array, layer: XrWebGlLayerLike): void {
    const aspect = layer.framebufferHeight > 0 ? layer.framebufferWidth / layer.framebufferHeight : 1;
    fillPerspectiveProjection(target, FALLBACK_VERTICAL_FOV, aspect, this.depthNear, this.depthFar);
  }

  private finishSession(active: ActiveSession): void {
    if (this.active !== active) {
      return;
    }

    this.active = null;
    for (const [type, listener] of active.listeners) {
      active.session.removeEventListener(type, listener);
    }
    active.listeners = [];
    if (active.frameHandle !== null) {
      active.session.cancelAnimationFrame(active.frameHandle);
      active.frameHandle = null;
    }
    this.inputs.clear();

    this.setState("ended", active.mode);
    this.logger.info("Session ended.", { mode: sessionModeName(active.mode) });
    this.callbacks?.end(active.mode);
  }

  private handleVisibilityChange(active: ActiveSession): void {
    if (this.active !== active) {
      return;
    }

    const visibility = active.session.visibilityState ?? "visible";
    if (visibility === "visible") {
      if (this.state.is("blurred")) {
        this.setState("active", active.mode);
        this.focusCallback?.(active.mode);
      }
      return;
    }

    if (this.state.is("active")) {
      this.setState("blurred", active.mode);
      this.blurCallback?.(active.mode);
    }
  }

  private handleInputSourcesChange(event: XrSessionEventLike): void {
    for (const removed of event.removed ?? []) {
      const id = this.inputs.release(removed);
      this.logger.debug("Input source disconnected.", { id });
    }
    for (const added of event.added ?? []) {
      const id = this.inputs.register(added);
      if (id < 0) {
        this.logger.warn("Input source ignored; all identifiers are in use.");
        continue;
      }
      this.logger.debug("Input source connected.", { id, handedness: added.handedness });
    }
  }

  private dispatchSelect(phase: SelectPhase, event: XrSessionEventLike): void {
    const callback = this.selectCallbacks[phase];
    const hostSource = event.inputSource;
    if (!callback || !hostSource) {
      return;
    }

    if (this.inputs.register(hostSource) < 0) {
      this.logger.warn(`Dropped ${phase}; all input identifiers are in use.`);
      return;
    }

    callback(this.inputs.describe(hostSource, createInputSource()));
  }

  private setInputCallback<TUserData>(
    phase: SelectPhase,
    callback: InputCallback<TUserData> | null,
    userData: TUserData
  ): void {
    if (!this.ensureInitialized(`set ${phase} callback`)) {
      return;
    }
    this.selectCallbacks[phase] = callback ? (source) => callback(source, userData) : null;
  }

  private resolveFeatureNames(request: SessionFeatureRequest | undefined, exclude: XrFeatureName[]): XrFeatureName[] {
    const names: XrFeatureName[] = [];
    for (const feature of toFeatureList(request)) {
      if (!isSessionFeature(feature)) {
        this.logger.warn("Ignoring unknown session feature.", { feature });
        continue;
      }

      const name = featureName(feature);
      if (!names.includes(name) && !exclude.includes(name)) {
        names.push(name);
      }
    }
    return names;
  }

  private async probeSessionSupport(xr: XrSystemLike | null, mode: SessionMode): Promise<boolean> {
    if (!xr || !isSessionMode(mode)) {
      return false;
    }

    try {
      return await xr.isSessionSupported(sessionModeName(mode));
    } catch (error) {
      this.logger.debug("Session support probe failed.", { mode: sessionModeName(mode), reason: describeError(error) });
      return false;
    }
  }

  private missInputPose(sourceId: number, reason: InputPoseMissReason): false {
    this.logger.debug("Input pose unavailable.", { sourceId, reason });
    this.events.emit("input/pose-miss", {
      sourceId,
      reason,
      timestampMs: performance.now()
    });
    return false;
  }

  private ensureInitialized(operation: string): boolean {
    if (this.state.is("uninitialized")) {
      this.logger.warn(`${operation} called before init(); ignoring.`);
      return false;
    }
    return true;
  }

  private setState(next: XrFacadeState, mode: SessionMode | null): void {
    this.state.transition(next);
    this.events.emit("xr/state", {
      state: next,
      mode,
      timestampMs: performance.now()
    });
  }

  private reportError(code: FacadeErrorCode, message: string, recoverable: boolean): void {
    if (recoverable) {
      this.logger.warn(message, { code });
    } else {
      this.logger.error(message, { code });
    }

    this.events.emit("xr/error", {
      code,
      message,
      recoverable,
      timestampMs: performance.now()
    });
    this.callbacks?.error(code);
  }
}
