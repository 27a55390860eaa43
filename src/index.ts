export { chunkText, describeChunks, truncateUtf8 } from "./auto-reply/chunk.js";
export { createDispatcher, type Dispatcher, type DispatcherDeps } from "./auto-reply/dispatch.js";
export { loadConfig, validateConfig, type MeshRelayConfig } from "./config/config.js";
export { createOutboundSender, type MeshPublisher, type OutboundSender } from "./infra/outbound/deliver.js";
export { normalize, type NormalizedMessage } from "./mesh/normalize.js";
export { createMeshRouter, type MeshRouter } from "./mesh/router.js";
export { startMeshRelay, type MeshRelayHandle } from "./relay/start.js";
export { SessionStore } from "./sessions/store.js";
