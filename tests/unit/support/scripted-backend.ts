import { BaseSessionBackend } from "../../../src/backends/base.js";
import type { BackendCompletions } from "../../../src/session/backend.js";
import type {
  JoinResult,
  OperationKind,
  SessionConfig,
  SessionSearchQuery,
  SessionSearchResult,
} from "../../../src/session/types.js";
import { GAME_SESSION_NAME } from "../../../src/shared/constants.js";

export interface ScriptedCall {
  op: OperationKind;
  sessionName?: string;
  config?: SessionConfig;
  query?: SessionSearchQuery;
  result?: SessionSearchResult;
}

/**
 * Backend whose completions are delivered only when a test calls one of the
 * `complete*` drivers. `accept` and `throwOnDispatch` script the synchronous answer.
 */
export class ScriptedBackend extends BaseSessionBackend {
  readonly identity: string;
  readonly calls: ScriptedCall[] = [];
  accept = true;
  throwOnDispatch = false;
  connectAddress: string | undefined = "10.0.0.5:7777";
  startSession?: (sessionName: string) => boolean;

  constructor(identity = "HOSTED", options: { supportsStart?: boolean } = {}) {
    super("scripted-backend");
    this.identity = identity;
    if (options.supportsStart !== false) {
      this.startSession = (sessionName) => this.answer({ op: "start", sessionName });
    }
  }

  createSession(_player: string, sessionName: string, config: SessionConfig): boolean {
    const accepted = this.answer({ op: "create", sessionName, config });
    if (accepted) this.pending.add(sessionName);
    return accepted;
  }

  findSessions(_player: string, query: SessionSearchQuery): boolean {
    return this.answer({ op: "find", query });
  }

  joinSession(_player: string, sessionName: string, result: SessionSearchResult): boolean {
    const accepted = this.answer({ op: "join", sessionName, result });
    if (accepted) this.pending.add(sessionName);
    return accepted;
  }

  destroySession(sessionName: string): boolean {
    const accepted = this.answer({ op: "destroy", sessionName });
    if (accepted) this.sessions.delete(sessionName);
    return accepted;
  }

  getResolvedConnectAddress(sessionName: string): string | undefined {
    return this.sessions.has(sessionName) ? this.connectAddress : undefined;
  }

  /** Put a named session in place as if an earlier create had succeeded. */
  hold(sessionName = GAME_SESSION_NAME, hosting = true): void {
    this.sessions.set(sessionName, { name: sessionName, handle: `h-${sessionName}`, state: "pending", hosting });
  }

  ops(): OperationKind[] {
    return this.calls.map((c) => c.op);
  }

  completeCreate(success: boolean, sessionName = GAME_SESSION_NAME): void {
    this.pending.delete(sessionName);
    if (success) this.hold(sessionName);
    this.complete("create", { sessionName, success });
  }

  completeFind(results: readonly SessionSearchResult[], success = true): void {
    this.complete("find", { results, success });
  }

  completeJoin(result: JoinResult, sessionName = GAME_SESSION_NAME): void {
    this.pending.delete(sessionName);
    if (result === "success") this.hold(sessionName, false);
    this.complete("join", { sessionName, result });
  }

  completeDestroy(success: boolean, sessionName = GAME_SESSION_NAME): void {
    this.complete("destroy", { sessionName, success });
  }

  completeStart(success: boolean, sessionName = GAME_SESSION_NAME): void {
    this.complete("start", { sessionName, success });
  }

  deliver<K extends OperationKind>(kind: K, completion: BackendCompletions[K]): void {
    this.complete(kind, completion);
  }

  private answer(call: ScriptedCall): boolean {
    this.calls.push(call);
    if (this.throwOnDispatch) throw new Error("backend exploded");
    return this.accept;
  }
}

export function searchResult(handle: string, matchTag: string, openSlots = 3): SessionSearchResult {
  return { handle, ownerId: `owner-${handle}`, openSlots, attributes: { matchTag } };
}

/** Resolve with the next completion of `kind` delivered by `backend`. */
export function nextCompletion<K extends OperationKind>(
  backend: BaseSessionBackend,
  kind: K
): Promise<BackendCompletions[K]> {
  return new Promise((resolve) => {
    const handle = backend.addCompletionListener(kind, (completion) => {
      backend.removeCompletionListener(kind, handle);
      resolve(completion);
    });
  });
}
