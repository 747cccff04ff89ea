export { createDemoApp, demoApp } from "./app";
export { resolveConfig } from "./config";
export { ConnectionHandler } from "./ConnectionHandler";
export type { ConnectionHandlerOptions } from "./ConnectionHandler";
export * from "./enums";
export { EventPool } from "./EventPool";
export type { EventPoolStats } from "./EventPool";
export { FlowControlManager } from "./FlowControlManager";
export type { FlowControlOptions, FlowControlStats } from "./FlowControlManager";
export { DEFAULT_SERVER_CONFIG, SERVER_NAME } from "./global";
export { RequestResponseCycle } from "./RequestResponseCycle";
export type { CycleHost, CycleOptions } from "./RequestResponseCycle";
export { Server } from "./Server";
export type { ServerDeps } from "./Server";
export { ServerState } from "./ServerState";
export type { ServerStateOptions, TrackedConnection } from "./ServerState";
export type * from "./types";
export {
  ClientDisconnectedError,
  ConfigError,
  HttpError,
  ResponseContractError,
  StartupError,
} from "./utils/HttpError";
export { createLogger } from "./utils/logger";
export type { Logger } from "./utils/logger";
export { Signal } from "./utils/Signal";
