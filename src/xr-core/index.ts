export { XrFacade } from "./facade";
export { FramebufferRegistry, DEFAULT_FRAMEBUFFER_ID } from "./framebuffers";
export { InputSourceRegistry } from "./input-registry";
export { SessionStateMachine, InvalidStateTransitionError, canTransition } from "./session-state";
export { resolveBrowserHost, isGraphicsContextLike } from "./host";
export type {
  GraphicsContextLike,
  XrFrameLike,
  XrHost,
  XrInputSourceLike,
  XrPoseLike,
  XrRigidTransformLike,
  XrSessionLike,
  XrSpaceLike,
  XrSystemLike,
  XrViewLike,
  XrViewerPoseLike,
  XrWebGlLayerLike
} from "./host";
export {
  composeRigidTransform,
  copyRigidTransform,
  copyView,
  createInputSource,
  createRigidTransform,
  createView,
  fillFromHostTransform,
  isRigidTransformConsistent
} from "./pose";
