import { describe, expect, it, jest } from "@jest/globals";

import {
  Handedness,
  HostErrorCode,
  InputPoseMode,
  SessionFeature,
  SessionMode,
  TargetRayMode,
  XrErrorCode
} from "../contracts/abi";
import type { FacadeErrorCode } from "../contracts/abi";
import type { FacadeEventMap } from "../contracts/events";
import type { FrameViews, InputSource, RigidTransform } from "../contracts/records";
import type { Logger } from "../app/logger";
import { silentLogger } from "../app/logger";
import {
  MockGraphicsContext,
  MockXrFrame,
  MockXrSystem,
  createHostTransform,
  createMockHost,
  createMockInputSource,
  createMonoViewerPose,
  createStereoViewerPose,
  flushPromises
} from "../testing/mock-host";
import type { MockHostOptions } from "../testing/mock-host";
import { XrFacade } from "./facade";
import type { GraphicsContextLike } from "./host";
import { createInputSource, createRigidTransform, isRigidTransformConsistent } from "./pose";

interface UserData {
  name: string;
}

interface FrameRecord {
  framebufferId: number;
  time: number;
  viewCount: number;
  head: number[];
  views: FrameViews;
}

interface HarnessOptions {
  xr?: MockXrSystem | null;
  context?: GraphicsContextLike | null;
  hostOptions?: MockHostOptions;
  logger?: Logger;
}

function createHarness(options: HarnessOptions = {}) {
  const xr = options.xr === undefined ? new MockXrSystem() : options.xr;
  const host = createMockHost(xr, options.hostOptions);
  const context = options.context === undefined ? new MockGraphicsContext() : options.context;
  const facade = new XrFacade({
    host,
    graphicsContext: context,
    logger: options.logger ?? silentLogger
  });
  const userData: UserData = { name: "app" };
  const order: string[] = [];
  const frames: FrameRecord[] = [];
  const hooks: { onFrame?: () => void } = {};

  const frame = jest.fn(
    (
      data: UserData,
      framebufferId: number,
      time: number,
      headPose: RigidTransform,
      views: FrameViews,
      viewCount: number
    ) => {
      order.push("frame");
      frames.push({ framebufferId, time, viewCount, head: Array.from(headPose.position), views });
      expect(data).toBe(userData);
      hooks.onFrame?.();
    }
  );
  const start = jest.fn((_data: UserData, mode: SessionMode) => {
    order.push(`start:${mode}`);
  });
  const end = jest.fn((_data: UserData, mode: SessionMode) => {
    order.push(`end:${mode}`);
  });
  const error = jest.fn((_data: UserData, code: FacadeErrorCode) => {
    order.push(`error:${code}`);
  });

  return {
    facade,
    xr,
    host,
    context,
    userData,
    order,
    frames,
    hooks,
    callbacks: { frame, start, end, error },
    init(): void {
      facade.init(frame, start, end, error, userData);
    }
  };
}

async function startVrSession(harness: ReturnType<typeof createHarness>) {
  harness.init();
  harness.facade.requestSession(SessionMode.ImmersiveVr, SessionFeature.LocalFloor, SessionFeature.HitTest);
  await flushPromises();
  if (!harness.xr) {
    throw new Error("Harness has no XR system.");
  }
  return harness.xr.lastSession;
}

function createMockLogger(): Logger {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn()
  };
}

describe("XrFacade init", () => {
  it("reports ApiUnsupported once on a host without XR and never renders", async () => {
    const harness = createHarness({ xr: null });
    harness.init();
    const supported = jest.fn();
    harness.facade.isSessionSupported(SessionMode.ImmersiveVr, supported);
    await flushPromises();

    expect(harness.callbacks.error).toHaveBeenCalledTimes(1);
    expect(harness.callbacks.error).toHaveBeenCalledWith(harness.userData, XrErrorCode.ApiUnsupported);
    expect(supported).toHaveBeenCalledWith(SessionMode.ImmersiveVr, 0);
    expect(harness.callbacks.frame).not.toHaveBeenCalled();
  });

  it("reports GlIncapable when no graphics context is available", () => {
    const harness = createHarness({ context: null });
    harness.init();

    expect(harness.callbacks.error).toHaveBeenCalledTimes(1);
    expect(harness.callbacks.error).toHaveBeenCalledWith(harness.userData, XrErrorCode.GlIncapable);
    expect(harness.facade.getState()).toBe("idle");
  });

  it("accepts a graphics context supplied after construction", () => {
    const harness = createHarness({ context: null });
    harness.facade.setGraphicsContext({ makeXRCompatible: () => Promise.resolve() });
    harness.init();

    expect(harness.callbacks.error).not.toHaveBeenCalled();
  });

  it("ignores a second init", async () => {
    const logger = createMockLogger();
    const harness = createHarness({ logger });
    harness.init();
    const otherStart = jest.fn();
    harness.facade.init(jest.fn(), otherStart, jest.fn(), jest.fn(), { name: "other" });

    harness.facade.requestSession(SessionMode.ImmersiveVr);
    await flushPromises();

    expect(logger.warn).toHaveBeenCalledWith("init() called more than once; ignoring.");
    expect(otherStart).not.toHaveBeenCalled();
    expect(harness.callbacks.start).toHaveBeenCalledWith(harness.userData, SessionMode.ImmersiveVr);
  });

  it("diagnoses control calls made before init", async () => {
    const logger = createMockLogger();
    const harness = createHarness({ logger });
    const supported = jest.fn();

    harness.facade.requestSession(SessionMode.ImmersiveVr);
    harness.facade.isSessionSupported(SessionMode.ImmersiveVr, supported);
    harness.facade.requestExit();
    await flushPromises();

    expect(logger.warn).toHaveBeenCalledWith("requestSession called before init(); ignoring.");
    expect(harness.facade.getInputSources([], 4)).toBe(0);
    expect(harness.facade.getInputPose(createInputSource(), createRigidTransform())).toBe(false);
    expect(harness.xr?.requests).toHaveLength(0);
    expect(supported).not.toHaveBeenCalled();
    expect(harness.facade.getState()).toBe("uninitialized");
  });
});

describe("XrFacade isSessionSupported", () => {
  it("reports immersive-vr support on a VR capable host", async () => {
    const harness = createHarness();
    harness.init();
    const supported = jest.fn();

    harness.facade.isSessionSupported(SessionMode.ImmersiveVr, supported);
    harness.facade.isSessionSupported(SessionMode.ImmersiveAr, supported);
    await flushPromises();

    expect(supported).toHaveBeenCalledTimes(2);
    expect(supported).toHaveBeenNthCalledWith(1, SessionMode.ImmersiveVr, 1);
    expect(supported).toHaveBeenNthCalledWith(2, SessionMode.ImmersiveAr, 0);
  });

  it("reports no immersive support on an inline-only host", async () => {
    const harness = createHarness({ xr: new MockXrSystem({ supportedModes: ["inline"] }) });
    harness.init();
    const supported = jest.fn();

    harness.facade.isSessionSupported(SessionMode.ImmersiveVr, supported);
    await flushPromises();

    expect(supported).toHaveBeenCalledTimes(1);
    expect(supported).toHaveBeenCalledWith(SessionMode.ImmersiveVr, 0);
  });

  it("treats a failing probe as unsupported", async () => {
    const xr = new MockXrSystem();
    xr.failProbes = true;
    const harness = createHarness({ xr });
    harness.init();
    const supported = jest.fn();

    harness.facade.isSessionSupported(SessionMode.Inline, supported);
    await flushPromises();

    expect(supported).toHaveBeenCalledWith(SessionMode.Inline, 0);
    expect(harness.callbacks.error).not.toHaveBeenCalled();
  });
});

describe("XrFacade session lifecycle", () => {
  it("runs a full immersive session round trip", async () => {
    const harness = createHarness();
    harness.init();
    harness.facade.requestSession(SessionMode.ImmersiveVr, SessionFeature.LocalFloor, SessionFeature.HitTest);

    expect(harness.xr?.requests).toEqual([
      {
        mode: "immersive-vr",
        init: { requiredFeatures: ["local-floor"], optionalFeatures: ["hit-test"] }
      }
    ]);
    expect(harness.facade.getState()).toBe("requested");

    await flushPromises();
    const session = harness.xr?.lastSession;
    if (!session) {
      throw new Error("Expected a granted session.");
    }

    expect(harness.callbacks.start).toHaveBeenCalledWith(harness.userData, SessionMode.ImmersiveVr);
    expect(harness.facade.getState()).toBe("active");
    expect(session.requestedReferenceSpaces).toEqual(["local-floor"]);
    expect(session.renderStates[0]).toEqual({
      baseLayer: harness.host.layers[0],
      depthNear: 0.1,
      depthFar: 1000
    });

    session.runFrame(16.7, new MockXrFrame(createStereoViewerPose([0, 1.6, 0])));
    session.runFrame(33.4, new MockXrFrame(createStereoViewerPose([0, 1.6, 0])));

    expect(harness.frames).toHaveLength(2);
    expect(harness.frames.map((frame) => frame.time)).toEqual([16, 33]);
    expect(harness.frames.map((frame) => frame.framebufferId)).toEqual([1, 1]);
    expect(harness.frames.map((frame) => frame.viewCount)).toEqual([2, 2]);
    expect(harness.frames[0].head[1]).toBeCloseTo(1.6, 5);
    expect(harness.frames[0].views).toBe(harness.frames[1].views);

    const [left, right] = harness.frames[1].views;
    expect(Array.from(left.viewport)).toEqual([0, 0, 1000, 1000]);
    expect(Array.from(right.viewport)).toEqual([1000, 0, 1000, 1000]);
    expect(left.projectionMatrix[0]).toBe(1);
    expect(right.projectionMatrix[0]).toBe(2);
    expect(left.viewPose.position[0]).toBeCloseTo(-0.032, 5);
    expect(isRigidTransformConsistent(right.viewPose)).toBe(true);

    harness.facade.requestExit();
    session.runFrame(50);
    await flushPromises();

    expect(harness.callbacks.end).toHaveBeenCalledWith(harness.userData, SessionMode.ImmersiveVr);
    expect(harness.order).toEqual(["start:1", "frame", "frame", "end:1"]);
    expect(harness.facade.getState()).toBe("ended");
    expect(session.pendingFrameCount).toBe(0);
    expect(session.listenerCount("select")).toBe(0);

    session.runFrame(66);
    expect(harness.frames).toHaveLength(2);
  });

  it("keeps frame time monotonic", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);

    session.runFrame(10.9);
    session.runFrame(10.2);
    session.runFrame(12.5);

    expect(harness.frames.map((frame) => frame.time)).toEqual([10, 10, 12]);
  });

  it("reports the default framebuffer as 0", async () => {
    const harness = createHarness({ hostOptions: { defaultFramebuffer: true } });
    const session = await startVrSession(harness);

    session.runFrame(1);

    expect(harness.frames[0].framebufferId).toBe(0);
  });

  it("delivers a single view for mono poses", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);

    session.runFrame(1, new MockXrFrame(createMonoViewerPose()));

    expect(harness.frames[0].viewCount).toBe(1);
    expect(Array.from(harness.frames[0].views[0].viewport)).toEqual([0, 0, 2000, 1000]);
  });

  it("still calls the frame callback before the viewer pose is known", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);

    session.runFrame(1, new MockXrFrame(null));
    const [fallback] = harness.frames[0].views;

    expect(harness.frames[0].viewCount).toBe(1);
    expect(harness.frames[0].head).toEqual([0, 0, 0]);
    expect(Array.from(fallback.viewport)).toEqual([0, 0, 2000, 1000]);
    expect(fallback.projectionMatrix[0]).toBeCloseTo(0.5, 5);
    expect(fallback.projectionMatrix[5]).toBeCloseTo(1, 5);
    expect(fallback.projectionMatrix[11]).toBe(-1);

    session.runFrame(2, new MockXrFrame(createStereoViewerPose()));
    session.runFrame(3, new MockXrFrame(null));

    expect(harness.frames.map((frame) => frame.viewCount)).toEqual([1, 2, 2]);
    expect(harness.frames[2].views[1].projectionMatrix[0]).toBe(2);
    expect(harness.frames[2].head[1]).toBeCloseTo(1.6, 5);
  });

  it("ends the session when the host ends it", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);

    session.runFrame(1);
    session.dispatch("end", {});
    session.runFrame(2);

    expect(harness.order).toEqual(["start:1", "frame", "end:1"]);
  });

  it("treats requestExit without a session as a no-op", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);

    harness.facade.requestExit();
    harness.facade.requestExit();
    await flushPromises();
    harness.facade.requestExit();
    await flushPromises();

    expect(session.endCalls).toBe(1);
    expect(harness.callbacks.end).toHaveBeenCalledTimes(1);
  });

  it("allows a new session after the previous one ended", async () => {
    const harness = createHarness();
    await startVrSession(harness);
    harness.facade.requestExit();
    await flushPromises();

    harness.facade.requestSession(SessionMode.Inline);
    await flushPromises();

    expect(harness.order).toEqual(["start:1", "end:1", "start:0"]);
    expect(harness.xr?.sessions).toHaveLength(2);
  });

  it("widens feature arguments to lists", async () => {
    const harness = createHarness();
    harness.init();
    harness.facade.requestSession(
      SessionMode.ImmersiveVr,
      [SessionFeature.Local, SessionFeature.LocalFloor],
      [SessionFeature.LocalFloor, SessionFeature.HitTest]
    );
    await flushPromises();

    expect(harness.xr?.requests[0].init).toEqual({
      requiredFeatures: ["local", "local-floor"],
      optionalFeatures: ["hit-test"]
    });
    expect(harness.xr?.lastSession.requestedReferenceSpaces).toEqual(["local"]);
  });

  it("falls back through reference spaces", async () => {
    const harness = createHarness({ xr: new MockXrSystem({ grantedReferenceSpaces: ["viewer"] }) });
    harness.init();
    harness.facade.requestSession(SessionMode.Inline);
    await flushPromises();

    expect(harness.xr?.lastSession.requestedReferenceSpaces).toEqual(["local", "viewer"]);
    expect(harness.callbacks.start).toHaveBeenCalledWith(harness.userData, SessionMode.Inline);
  });

  it("logs a throwing start callback without reporting an error code", async () => {
    const logger = createMockLogger();
    const harness = createHarness({ logger });
    const failure = new Error("boom");
    harness.callbacks.start.mockImplementation(() => {
      throw failure;
    });

    await startVrSession(harness);

    expect(logger.error).toHaveBeenCalledWith("Session start callback failed.", failure);
    expect(harness.callbacks.error).not.toHaveBeenCalled();
    expect(harness.facade.getState()).toBe("active");
  });
});

describe("XrFacade session errors", () => {
  it("rejects a second request while a session is active", async () => {
    const harness = createHarness();
    await startVrSession(harness);

    harness.facade.requestSession(SessionMode.ImmersiveVr);

    expect(harness.callbacks.error).toHaveBeenCalledWith(harness.userData, HostErrorCode.SessionBusy);
    expect(harness.xr?.requests).toHaveLength(1);
    expect(harness.facade.getState()).toBe("active");
  });

  it("rejects a second request while the first is pending", async () => {
    const harness = createHarness();
    harness.init();
    harness.facade.requestSession(SessionMode.ImmersiveVr);
    harness.facade.requestSession(SessionMode.ImmersiveVr);
    await flushPromises();

    expect(harness.order).toEqual([`error:${HostErrorCode.SessionBusy}`, "start:1"]);
  });

  it("reports SessionUnsupported for an unavailable immersive mode", async () => {
    const harness = createHarness();
    harness.init();
    harness.facade.requestSession(SessionMode.ImmersiveAr);
    await flushPromises();

    expect(harness.callbacks.error).toHaveBeenCalledWith(harness.userData, XrErrorCode.SessionUnsupported);
    expect(harness.callbacks.start).not.toHaveBeenCalled();
    expect(harness.facade.getState()).toBe("idle");

    harness.facade.requestSession(SessionMode.ImmersiveVr);
    await flushPromises();
    expect(harness.callbacks.start).toHaveBeenCalledWith(harness.userData, SessionMode.ImmersiveVr);
  });

  it("reports a host-specific code when an inline request fails", async () => {
    const harness = createHarness({ xr: new MockXrSystem({ supportedModes: ["immersive-vr"] }) });
    harness.init();
    harness.facade.requestSession(SessionMode.Inline);
    await flushPromises();

    expect(harness.callbacks.error).toHaveBeenCalledWith(harness.userData, HostErrorCode.SessionRequestFailed);
  });

  it("ends the granted session when the context is not XR compatible", async () => {
    const context = new MockGraphicsContext();
    context.compatible = false;
    const harness = createHarness({ context });
    harness.init();
    harness.facade.requestSession(SessionMode.ImmersiveVr);
    await flushPromises();

    expect(harness.callbacks.error).toHaveBeenCalledWith(harness.userData, XrErrorCode.GlIncapable);
    expect(harness.xr?.lastSession.endCalls).toBe(1);
    expect(harness.callbacks.start).not.toHaveBeenCalled();
    expect(harness.callbacks.end).not.toHaveBeenCalled();
    expect(harness.facade.getState()).toBe("idle");
  });

  it("reports when no reference space can be resolved", async () => {
    const harness = createHarness({ xr: new MockXrSystem({ grantedReferenceSpaces: [] }) });
    harness.init();
    harness.facade.requestSession(SessionMode.ImmersiveVr, SessionFeature.LocalFloor);
    await flushPromises();

    const session = harness.xr?.lastSession;
    expect(session?.requestedReferenceSpaces).toEqual(["local-floor", "local", "viewer"]);
    expect(session?.endCalls).toBe(1);
    expect(harness.callbacks.error).toHaveBeenCalledWith(
      harness.userData,
      HostErrorCode.ReferenceSpaceUnavailable
    );
  });

  it("mirrors errors on the event bus", async () => {
    const harness = createHarness();
    const errors: FacadeEventMap["xr/error"][] = [];
    harness.facade.events.on("xr/error", (payload) => errors.push(payload));
    harness.init();
    harness.facade.requestSession(SessionMode.ImmersiveAr);
    await flushPromises();

    expect(errors).toHaveLength(1);
    expect(errors[0].code).toBe(XrErrorCode.SessionUnsupported);
    expect(errors[0].recoverable).toBe(true);
    expect(errors[0].message).toBe("Unable to start immersive-ar session: immersive-ar is not supported.");
  });
});

describe("XrFacade visibility", () => {
  it("routes blur and focus to the registered callbacks", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);
    const firstBlur = jest.fn();
    const blur = jest.fn();
    const focus = jest.fn();
    harness.facade.setSessionBlurCallback(firstBlur, "first");
    harness.facade.setSessionBlurCallback(blur, "blur-data");
    harness.facade.setSessionFocusCallback(focus, "focus-data");

    session.setVisibility("visible-blurred");
    expect(harness.facade.getState()).toBe("blurred");
    session.setVisibility("hidden");
    session.setVisibility("visible");

    expect(firstBlur).not.toHaveBeenCalled();
    expect(blur).toHaveBeenCalledTimes(1);
    expect(blur).toHaveBeenCalledWith("blur-data", SessionMode.ImmersiveVr);
    expect(focus).toHaveBeenCalledTimes(1);
    expect(focus).toHaveBeenCalledWith("focus-data", SessionMode.ImmersiveVr);
    expect(harness.facade.getState()).toBe("active");
  });

  it("honours the visibility a session is granted with", async () => {
    const harness = createHarness({ xr: new MockXrSystem({ initialVisibility: "visible-blurred" }) });
    const blur = jest.fn();
    const focus = jest.fn();
    harness.init();
    harness.facade.setSessionBlurCallback(blur, null);
    harness.facade.setSessionFocusCallback(focus, null);
    harness.facade.requestSession(SessionMode.ImmersiveVr);
    await flushPromises();

    expect(harness.facade.getState()).toBe("blurred");
    expect(blur).toHaveBeenCalledWith(null, SessionMode.ImmersiveVr);
    expect(harness.callbacks.start).toHaveBeenCalledTimes(1);

    harness.xr?.lastSession.setVisibility("visible");

    expect(focus).toHaveBeenCalledTimes(1);
    expect(harness.facade.getState()).toBe("active");
  });

  it("ends a blurred session normally", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);

    session.setVisibility("hidden");
    harness.facade.requestExit();
    await flushPromises();

    expect(harness.facade.getState()).toBe("ended");
    expect(harness.callbacks.end).toHaveBeenCalledTimes(1);
  });
});

describe("XrFacade projection parameters", () => {
  it("pushes new clip distances to a running session", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);

    harness.facade.setProjectionParams(0.5, 50);

    expect(session.renderStates[1]).toEqual({ depthNear: 0.5, depthFar: 50 });
    expect(harness.facade.getProjectionParams()).toEqual({ near: 0.5, far: 50 });
  });

  it("keeps new clip distances for the next session while exiting", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);

    harness.facade.requestExit();
    expect(() => harness.facade.setProjectionParams(0.5, 50)).not.toThrow();
    await flushPromises();

    expect(session.renderStates).toHaveLength(1);
    expect(harness.facade.getProjectionParams()).toEqual({ near: 0.5, far: 50 });

    harness.facade.requestSession(SessionMode.ImmersiveVr);
    await flushPromises();

    expect(harness.xr?.lastSession.renderStates[0]).toMatchObject({ depthNear: 0.5, depthFar: 50 });
  });

  it("applies stored clip distances at session start", async () => {
    const harness = createHarness();
    harness.init();
    harness.facade.setProjectionParams(0.25, 20);
    harness.facade.requestSession(SessionMode.ImmersiveVr);
    await flushPromises();

    expect(harness.xr?.lastSession.renderStates[0]).toMatchObject({ depthNear: 0.25, depthFar: 20 });
  });

  it("clamps invalid clip distances", () => {
    const logger = createMockLogger();
    const harness = createHarness({ logger });
    harness.init();

    harness.facade.setProjectionParams(0, -1);
    const { near, far } = harness.facade.getProjectionParams();

    expect(near).toBe(0.01);
    expect(far).toBeCloseTo(0.02, 10);
    expect(logger.warn).toHaveBeenCalledTimes(1);
    expect(harness.callbacks.error).not.toHaveBeenCalled();
  });
});

describe("XrFacade input", () => {
  it("delivers select phases in order with a stable source id", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);
    const left = createMockInputSource({ handedness: "left" });
    const right = createMockInputSource({ handedness: "right" });
    session.connect(left);
    session.connect(right);

    const seen: string[] = [];
    const record = (phase: string) => (source: InputSource, data: string) => {
      seen.push(`${phase}:${source.id}:${source.handedness}:${data}`);
    };
    harness.facade.setSelectStartCallback(record("start"), "a");
    harness.facade.setSelectCallback(record("select"), "b");
    harness.facade.setSelectEndCallback(record("end"), "c");

    session.press(right);
    session.release(right);

    expect(seen).toEqual(["start:1:1:a", "select:1:1:b", "end:1:1:c"]);
  });

  it("skips phases without a handler", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);
    const source = createMockInputSource();
    session.connect(source);
    const select = jest.fn();
    harness.facade.setSelectCallback(select, null);
    harness.facade.setSelectStartCallback(jest.fn(), null);
    harness.facade.setSelectStartCallback(null, null);

    session.press(source);
    session.release(source);

    expect(select).toHaveBeenCalledTimes(1);
  });

  it("enumerates input sources up to the caller's limit", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);
    session.connect(createMockInputSource({ handedness: "left" }));
    session.connect(createMockInputSource({ handedness: "right" }));

    const one: InputSource[] = [];
    expect(harness.facade.getInputSources(one, 1)).toBe(1);
    expect(one).toEqual([{ id: 0, handedness: Handedness.Left, targetRayMode: TargetRayMode.TrackedPointer }]);

    const reused = createInputSource();
    const all: InputSource[] = [reused];
    expect(harness.facade.getInputSources(all, 8)).toBe(2);
    expect(all[0]).toBe(reused);
    expect(all[1]).toEqual({ id: 1, handedness: Handedness.Right, targetRayMode: TargetRayMode.TrackedPointer });
  });

  it("reports no input sources outside a session", async () => {
    const harness = createHarness();
    harness.init();
    expect(harness.facade.getInputSources([], 4)).toBe(0);

    harness.facade.requestSession(SessionMode.ImmersiveVr);
    await flushPromises();
    harness.xr?.lastSession.connect(createMockInputSource());
    harness.facade.requestExit();
    await flushPromises();

    expect(harness.facade.getInputSources([], 4)).toBe(0);
  });

  it("reuses identifiers after a source disconnects", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);
    const left = createMockInputSource({ handedness: "left" });
    session.connect(left);
    session.connect(createMockInputSource({ handedness: "right" }));
    session.disconnect(left);
    session.connect(createMockInputSource({ handedness: "none", targetRayMode: "gaze" }));

    const out: InputSource[] = [];
    const count = harness.facade.getInputSources(out, 4);

    expect(count).toBe(2);
    expect(out).toEqual([
      { id: 1, handedness: Handedness.Right, targetRayMode: TargetRayMode.TrackedPointer },
      { id: 0, handedness: Handedness.None, targetRayMode: TargetRayMode.Gaze }
    ]);
  });

  it("returns input poses only during a frame callback", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);
    const controller = createMockInputSource({ handedness: "right" });
    session.connect(controller);
    const sources: InputSource[] = [];
    harness.facade.getInputSources(sources, 1);
    const source = sources[0];

    const outsidePose = createRigidTransform();
    outsidePose.position.set([9, 9, 9]);
    expect(harness.facade.getInputPose(source, outsidePose)).toBe(false);
    expect(Array.from(outsidePose.position)).toEqual([9, 9, 9]);

    const results: boolean[] = [];
    const gripPose = createRigidTransform();
    const rayPose = createRigidTransform();
    harness.hooks.onFrame = () => {
      results.push(harness.facade.getInputPose(source, gripPose, InputPoseMode.Grip));
      results.push(harness.facade.getInputPose(source, rayPose, InputPoseMode.TargetRay));
    };
    session.runFrame(1, new MockXrFrame().setInputPose(controller, "grip", createHostTransform([0.2, 1, -0.3])));

    expect(results).toEqual([true, false]);
    expect(gripPose.position[0]).toBeCloseTo(0.2, 5);
    expect(gripPose.position[2]).toBeCloseTo(-0.3, 5);
    expect(isRigidTransformConsistent(gripPose)).toBe(true);
    expect(Array.from(rayPose.position)).toEqual([0, 0, 0]);
  });

  it("fails input pose queries from select callbacks", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);
    const controller = createMockInputSource();
    session.connect(controller);
    const misses: FacadeEventMap["input/pose-miss"][] = [];
    harness.facade.events.on("input/pose-miss", (payload) => misses.push(payload));

    const results: boolean[] = [];
    harness.facade.setSelectCallback((source: InputSource) => {
      results.push(harness.facade.getInputPose(source, createRigidTransform()));
    }, null);
    session.press(controller);
    session.release(controller);

    expect(results).toEqual([false]);
    expect(misses.map((miss) => miss.reason)).toEqual(["not-in-frame"]);
  });

  it("distinguishes pose failure reasons on the event bus", async () => {
    const harness = createHarness();
    const session = await startVrSession(harness);
    const gripless = createMockInputSource({ withGrip: false });
    session.connect(gripless);
    const misses: FacadeEventMap["input/pose-miss"][] = [];
    harness.facade.events.on("input/pose-miss", (payload) => misses.push(payload));

    harness.hooks.onFrame = () => {
      const known = { id: 0, handedness: Handedness.Right, targetRayMode: TargetRayMode.TrackedPointer };
      const unknown = { ...known, id: 7 };
      harness.facade.getInputPose(known, createRigidTransform());
      harness.facade.getInputPose(unknown, createRigidTransform());
    };
    session.runFrame(1);

    expect(misses.map((miss) => [miss.sourceId, miss.reason])).toEqual([
      [0, "no-space"],
      [7, "unknown-source"]
    ]);
  });
});

describe("XrFacade state events", () => {
  it("replays the latest state to late subscribers", async () => {
    const harness = createHarness();
    await startVrSession(harness);

    const states: FacadeEventMap["xr/state"][] = [];
    harness.facade.events.on("xr/state", (payload) => states.push(payload));

    expect(states).toHaveLength(1);
    expect(states[0].state).toBe("active");
    expect(states[0].mode).toBe(SessionMode.ImmersiveVr);
  });
});
