export * from "./contracts";
export * from "./abi";
export * from "./xr-core";
export * from "./bindings";
export { createFacadeEventBus } from "./app/event-bus";
export { createConsoleLogger, silentLogger } from "./app/logger";
export type { LogLevel, Logger } from "./app/logger";
export {
  DEFAULT_DEPTH_FAR,
  DEFAULT_DEPTH_NEAR,
  DEFAULT_MAX_INPUT_SOURCES,
  MAX_INPUT_SOURCES_LIMIT,
  clampDepthRange,
  resolveXrFacadeConfig
} from "./app/config";
export type { XrFacadeConfig, XrFacadeOptions } from "./app/config";
