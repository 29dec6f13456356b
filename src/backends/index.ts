/**
 * Session backends: the orchestrator is started with a single backend (--backend lan | hosted).
 * - BaseSessionBackend: abstract base holding completion listeners and named sessions.
 * - LanSessionBackend: identity NULL, advertises on an in-process broadcast domain.
 * - HostedSessionBackend: client of the matchmaking hub.
 */

export { BaseSessionBackend } from "./base.js";
export { LanSessionBackend, createLanBackend } from "./lan.js";
export type { LanBackendOptions } from "./lan.js";
export { HostedSessionBackend, createHostedBackend } from "./hosted.js";
export type { FetchLike, HostedBackendOptions } from "./hosted.js";

import type { SessionBackend } from "../session/backend.js";
import { createLanBackend, type LanBackendOptions } from "./lan.js";
import { createHostedBackend, type HostedBackendOptions } from "./hosted.js";

export type SessionBackendKind = "lan" | "hosted";

export const SESSION_BACKEND_KINDS: readonly SessionBackendKind[] = ["lan", "hosted"];

export function isSessionBackendKind(value: string): value is SessionBackendKind {
  return (SESSION_BACKEND_KINDS as readonly string[]).includes(value);
}

export type SessionBackendOptions =
  | ({ kind: "lan" } & LanBackendOptions)
  | ({ kind: "hosted" } & HostedBackendOptions);

export function createSessionBackend(options: SessionBackendOptions): SessionBackend {
  switch (options.kind) {
    case "lan":
      return createLanBackend(options);
    case "hosted":
      return createHostedBackend(options);
  }
}
