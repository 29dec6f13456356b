import { GAME_SESSION_NAME } from "../shared/constants.js";
import { NotImplementedError, OperationInProgressError } from "../shared/errors.js";
import { componentLogger } from "../shared/logging.js";
import type { BackendCompletions, ListenerHandle, SessionBackend } from "./backend.js";
import { NotificationBus } from "./bus.js";
import { buildSearchQuery, buildSessionConfig } from "./config.js";
import { SubscriptionSlots, type OperationSubscription } from "./subscriptions.js";
import {
  JoinResult,
  type NamedSession,
  type OperationEvent,
  type OperationKind,
  type SessionConfig,
  type SessionSearchQuery,
  type SessionSearchResult,
} from "./types.js";

export interface SessionOrchestratorOptions {
  /** Session provider for this host; leave undefined when the platform has none. */
  backend?: SessionBackend;
  bus?: NotificationBus;
  localPlayerId: string;
  sessionName?: string;
}

/** Outcome decided before any backend call, with an optional error to reject with. */
interface ShortCircuit<K extends OperationKind> {
  event: OperationEvent<K>;
  error?: Error;
}

interface OperationPlan<K extends OperationKind> {
  precheck?: (backend: SessionBackend) => ShortCircuit<K> | undefined;
  /** Issue the backend call; `false` or a throw is a synchronous rejection. */
  dispatch: (backend: SessionBackend) => boolean;
  /** Completions this operation must not settle on, such as one already claimed elsewhere. */
  ignore?: (completion: BackendCompletions[K]) => boolean;
  settle: (completion: BackendCompletions[K]) => OperationEvent<K>;
  rejected: OperationEvent<K>;
}

/**
 * Drives create/find/join/destroy/start against a SessionBackend.
 *
 * Each operation kind moves idle → pending → idle. While pending, the kind
 * owns exactly one backend completion listener; a second call of the same
 * kind is rejected with OperationInProgressError. Every issued operation
 * publishes exactly one event on the bus and resolves with that same event.
 */
export class SessionOrchestrator {
  readonly bus: NotificationBus;
  readonly localPlayerId: string;
  readonly sessionName: string;

  private readonly backend: SessionBackend | undefined;
  private readonly slots = new SubscriptionSlots();
  private readonly aborts = new Map<OperationKind, () => void>();
  /** Destroy completions that answer the teardown issued ahead of a create. */
  private readonly claimedDestroys = new WeakSet<BackendCompletions["destroy"]>();
  private readonly teardownListeners = new Set<ListenerHandle>();
  private readonly logger = componentLogger("orchestrator");
  private config: SessionConfig | undefined;
  private query: SessionSearchQuery | undefined;

  constructor(options: SessionOrchestratorOptions) {
    this.backend = options.backend;
    this.bus = options.bus ?? new NotificationBus();
    this.localPlayerId = options.localPlayerId;
    this.sessionName = options.sessionName ?? GAME_SESSION_NAME;
    if (!this.backend) {
      this.logger.warn("no session backend configured; every operation will fail");
    }
  }

  get backendIdentity(): string | undefined {
    return this.backend?.identity;
  }

  /** Settings submitted by the most recent create attempt. */
  get lastSessionConfig(): SessionConfig | undefined {
    return this.config;
  }

  get lastSearchQuery(): SessionSearchQuery | undefined {
    return this.query;
  }

  isPending(kind: OperationKind): boolean {
    return this.slots.isActive(kind);
  }

  subscriptions(): OperationSubscription[] {
    return this.slots.snapshot();
  }

  getNamedSession(): NamedSession | undefined {
    return this.backend?.getNamedSession(this.sessionName);
  }

  /** Address to connect to after a successful join. */
  getResolvedConnectAddress(): string | undefined {
    return this.backend?.getResolvedConnectAddress(this.sessionName);
  }

  createSession(maxPublicSlots: number, matchTag: string): Promise<OperationEvent<"create">> {
    return this.run("create", {
      dispatch: (backend) => {
        const config = buildSessionConfig(backend.identity, maxPublicSlots, matchTag);
        if (backend.getNamedSession(this.sessionName)) {
          this.logger.info({ session: this.sessionName }, "destroying existing session before create");
          this.destroyBeforeCreate(backend);
        }
        this.config = config;
        return backend.createSession(this.localPlayerId, this.sessionName, config);
      },
      settle: (completion) => ({ success: completion.success }),
      rejected: { success: false },
    });
  }

  findSessions(maxResults: number): Promise<OperationEvent<"find">> {
    return this.run("find", {
      dispatch: (backend) => {
        const query = buildSearchQuery(backend.identity, maxResults);
        this.query = query;
        return backend.findSessions(this.localPlayerId, query);
      },
      // An empty result set is never a successful search.
      settle: (completion) => ({
        results: completion.results,
        success: completion.success && completion.results.length > 0,
      }),
      rejected: { results: [], success: false },
    });
  }

  joinSession(searchResult: SessionSearchResult): Promise<OperationEvent<"join">> {
    return this.run("join", {
      dispatch: (backend) => backend.joinSession(this.localPlayerId, this.sessionName, searchResult),
      settle: (completion) => ({ result: completion.result }),
      rejected: { result: JoinResult.UnknownError },
    });
  }

  /**
   * Tear down the named session. With no session this succeeds without a backend call.
   * While a create or join for the name is still in flight it fails, also without a call.
   */
  destroySession(): Promise<OperationEvent<"destroy">> {
    return this.run("destroy", {
      precheck: (backend) => {
        if (backend.getNamedSession(this.sessionName)) return undefined;
        if (backend.hasPendingSession(this.sessionName)) {
          this.logger.warn(
            { session: this.sessionName },
            "destroy requested while the session is still being established"
          );
          return { event: { success: false } };
        }
        return { event: { success: true } };
      },
      dispatch: (backend) => backend.destroySession(this.sessionName),
      ignore: (completion) => this.claimedDestroys.has(completion),
      settle: (completion) => ({ success: completion.success }),
      rejected: { success: false },
    });
  }

  /** Mark the named session started. With no session this fails without a backend call. */
  startSession(): Promise<OperationEvent<"start">> {
    return this.run("start", {
      precheck: (backend) => {
        if (!backend.startSession) {
          return {
            event: { success: false },
            error: new NotImplementedError("start", backend.identity),
          };
        }
        if (!backend.getNamedSession(this.sessionName)) {
          this.logger.warn({ session: this.sessionName }, "start requested with no active session");
          return { event: { success: false } };
        }
        return undefined;
      },
      dispatch: (backend) => (backend.startSession ? backend.startSession(this.sessionName) : false),
      settle: (completion) => ({ success: completion.success }),
      rejected: { success: false },
    });
  }

  /** Settle every pending operation as failed and drop its backend listener. */
  dispose(): void {
    for (const abort of [...this.aborts.values()]) abort();
    if (this.backend) {
      for (const handle of this.teardownListeners) this.backend.removeCompletionListener("destroy", handle);
    }
    this.teardownListeners.clear();
  }

  /**
   * Issue the teardown that precedes a create. Its completion is claimed here,
   * before any later destroySession listener sees it.
   */
  private destroyBeforeCreate(backend: SessionBackend): void {
    const handle = backend.addCompletionListener("destroy", (completion) => {
      if (completion.sessionName !== this.sessionName) return;
      this.dropTeardownListener(backend, handle);
      this.claimedDestroys.add(completion);
      this.logger.debug({ session: this.sessionName, success: completion.success }, "pre-create teardown complete");
    });
    this.teardownListeners.add(handle);
    let accepted = false;
    try {
      accepted = backend.destroySession(this.sessionName);
    } finally {
      if (!accepted) this.dropTeardownListener(backend, handle);
    }
  }

  private dropTeardownListener(backend: SessionBackend, handle: ListenerHandle): void {
    backend.removeCompletionListener("destroy", handle);
    this.teardownListeners.delete(handle);
  }

  private run<K extends OperationKind>(kind: K, plan: OperationPlan<K>): Promise<OperationEvent<K>> {
    if (this.slots.isActive(kind)) {
      return Promise.reject(new OperationInProgressError(kind));
    }

    const backend = this.backend;
    if (!backend) {
      this.logger.warn({ kind }, "session backend unavailable");
      this.bus.publish(kind, plan.rejected);
      return Promise.resolve(plan.rejected);
    }

    const early = plan.precheck?.(backend);
    if (early) {
      this.bus.publish(kind, early.event);
      return early.error ? Promise.reject(early.error) : Promise.resolve(early.event);
    }

    return new Promise<OperationEvent<K>>((resolve) => {
      let settled = false;
      const finish = (event: OperationEvent<K>): void => {
        if (settled) return;
        settled = true;
        this.aborts.delete(kind);
        this.slots.release(kind, backend);
        this.logger.debug({ kind, event }, "operation complete");
        this.bus.publish(kind, event);
        resolve(event);
      };

      this.slots.reserve(kind);
      this.aborts.set(kind, () => finish(plan.rejected));
      const handle = backend.addCompletionListener(kind, (completion) => {
        if ("sessionName" in completion && completion.sessionName !== this.sessionName) return;
        if (plan.ignore?.(completion)) return;
        finish(plan.settle(completion));
      });
      this.slots.attach(kind, handle);

      let accepted = false;
      try {
        accepted = plan.dispatch(backend);
      } catch (err) {
        this.logger.error({ err, kind }, "session operation could not be dispatched");
      }
      if (!accepted) {
        this.logger.warn({ kind, backend: backend.identity }, "backend rejected session operation");
        finish(plan.rejected);
      }
    });
  }
}
