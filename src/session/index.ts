/**
 * Session lifecycle core:
 * - SessionOrchestrator: issues create/find/join/destroy/start and publishes one outcome per call.
 * - NotificationBus: typed broadcast channels the orchestrator publishes to.
 * - SessionBackend: the provider contract (LAN, hosted) consumed by the orchestrator.
 */

export { SessionOrchestrator } from "./orchestrator.js";
export type { SessionOrchestratorOptions } from "./orchestrator.js";
export { NotificationBus } from "./bus.js";
export type { NotificationListener } from "./bus.js";
export { SubscriptionSlots } from "./subscriptions.js";
export type { OperationSubscription } from "./subscriptions.js";
export {
  advertisingModeFor,
  buildSearchQuery,
  buildSessionConfig,
  isLanIdentity,
  selectByMatchTag,
} from "./config.js";
export type { BackendCompletions, CompletionListener, ListenerHandle, SessionBackend } from "./backend.js";
export { JoinResult, JOIN_RESULTS, OPERATION_KINDS } from "./types.js";
export type {
  AdvertisingMode,
  NamedSession,
  OperationEvent,
  OperationEvents,
  OperationKind,
  SessionAttributes,
  SessionConfig,
  SessionSearchQuery,
  SessionSearchResult,
  SessionState,
} from "./types.js";
