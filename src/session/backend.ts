import type {
  JoinResult,
  NamedSession,
  OperationKind,
  SessionConfig,
  SessionSearchQuery,
  SessionSearchResult,
} from "./types.js";

/** Payload each backend completion carries, per operation kind. */
export interface BackendCompletions {
  create: { sessionName: string; success: boolean };
  find: { results: readonly SessionSearchResult[]; success: boolean };
  join: { sessionName: string; result: JoinResult };
  destroy: { sessionName: string; success: boolean };
  start: { sessionName: string; success: boolean };
}

export type CompletionListener<K extends OperationKind> = (completion: BackendCompletions[K]) => void;

/** Token returned by addCompletionListener; pass it back to remove the listener. */
export type ListenerHandle = string;

/**
 * Network-session provider. Calls return immediately: `false` means the call
 * was rejected and no completion will follow; `true` means exactly one
 * completion of that kind will be delivered to the registered listeners.
 * Create and join are rejected while the name is held or still pending.
 */
export interface SessionBackend {
  /** `NULL` for the local/LAN provider; anything else is hosted. */
  readonly identity: string;

  getNamedSession(sessionName: string): NamedSession | undefined;
  /** A create or join for this name was accepted and has not completed yet. */
  hasPendingSession(sessionName: string): boolean;
  createSession(localPlayerId: string, sessionName: string, config: SessionConfig): boolean;
  findSessions(localPlayerId: string, query: SessionSearchQuery): boolean;
  joinSession(localPlayerId: string, sessionName: string, result: SessionSearchResult): boolean;
  destroySession(sessionName: string): boolean;
  startSession?(sessionName: string): boolean;
  getResolvedConnectAddress(sessionName: string): string | undefined;

  addCompletionListener<K extends OperationKind>(kind: K, listener: CompletionListener<K>): ListenerHandle;
  removeCompletionListener(kind: OperationKind, handle: ListenerHandle): void;
}
