export type OperationKind = "create" | "find" | "join" | "destroy" | "start";

export const OPERATION_KINDS: readonly OperationKind[] = ["create", "find", "join", "destroy", "start"];

export type AdvertisingMode = "lan" | "hosted";

/** Settings submitted to the backend for one create attempt. */
export interface SessionConfig {
  readonly maxPublicSlots: number;
  readonly matchTag: string;
  readonly advertisingMode: AdvertisingMode;
  readonly joinInProgressAllowed: boolean;
  readonly usesPresence: boolean;
  readonly preferLobbies: boolean;
  readonly shouldAdvertise: boolean;
}

export interface SessionSearchQuery {
  readonly maxResults: number;
  readonly lanOnly: boolean;
  readonly lobbiesOnly: boolean;
}

/** Advertised attributes of a search result. `matchTag` is always present. */
export type SessionAttributes = Readonly<Record<string, string>> & { readonly matchTag: string };

export interface SessionSearchResult {
  /** Opaque backend handle, only meaningful to the backend that produced it. */
  readonly handle: string;
  readonly ownerId: string;
  readonly openSlots: number;
  readonly attributes: SessionAttributes;
}

export const JoinResult = {
  Success: "success",
  SessionIsFull: "session-is-full",
  SessionDoesNotExist: "session-does-not-exist",
  CouldNotRetrieveAddress: "could-not-retrieve-address",
  AlreadyInSession: "already-in-session",
  UnknownError: "unknown-error",
} as const;

export type JoinResult = (typeof JoinResult)[keyof typeof JoinResult];

export const JOIN_RESULTS: readonly JoinResult[] = Object.values(JoinResult);

export type SessionState = "pending" | "in-progress";

/** A session the backend currently holds under a name on this host. */
export interface NamedSession {
  readonly name: string;
  readonly handle: string;
  readonly state: SessionState;
  readonly config?: SessionConfig;
  readonly hosting: boolean;
}

/** Outcome published for each operation kind. */
export interface OperationEvents {
  create: { success: boolean };
  find: { results: readonly SessionSearchResult[]; success: boolean };
  join: { result: JoinResult };
  destroy: { success: boolean };
  start: { success: boolean };
}

export type OperationEvent<K extends OperationKind> = OperationEvents[K];
