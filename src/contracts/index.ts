export * from "./abi";
export type * from "./callbacks";
export type * from "./events";
export type * from "./integration";
export type * from "./records";
export type * from "./xr";
