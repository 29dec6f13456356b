import { genId } from "../shared/ids.js";
import { componentLogger } from "../shared/logging.js";
import type {
  BackendCompletions,
  CompletionListener,
  ListenerHandle,
  SessionBackend,
} from "../session/backend.js";
import type {
  NamedSession,
  OperationKind,
  SessionConfig,
  SessionSearchQuery,
  SessionSearchResult,
} from "../session/types.js";

type ListenerTable = { [K in OperationKind]: Map<ListenerHandle, CompletionListener<K>> };

/**
 * Abstract base for session backends (LAN, hosted).
 * Keeps completion listeners and the named sessions held on this host;
 * subclasses implement the operations and call complete() once per accepted call.
 */
export abstract class BaseSessionBackend implements SessionBackend {
  abstract readonly identity: string;

  protected readonly sessions = new Map<string, NamedSession>();
  /** Names with a create or join accepted but not yet completed. */
  protected readonly pending = new Set<string>();
  protected readonly logger: ReturnType<typeof componentLogger>;

  private readonly listeners: ListenerTable = {
    create: new Map(),
    find: new Map(),
    join: new Map(),
    destroy: new Map(),
    start: new Map(),
  };

  constructor(component: string) {
    this.logger = componentLogger(component);
  }

  abstract createSession(localPlayerId: string, sessionName: string, config: SessionConfig): boolean;
  abstract findSessions(localPlayerId: string, query: SessionSearchQuery): boolean;
  abstract joinSession(localPlayerId: string, sessionName: string, result: SessionSearchResult): boolean;
  abstract destroySession(sessionName: string): boolean;
  abstract getResolvedConnectAddress(sessionName: string): string | undefined;

  getNamedSession(sessionName: string): NamedSession | undefined {
    return this.sessions.get(sessionName);
  }

  hasPendingSession(sessionName: string): boolean {
    return this.pending.has(sessionName);
  }

  /** True when the name is held or a create/join for it is still in flight. */
  protected isNameTaken(sessionName: string): boolean {
    return this.sessions.has(sessionName) || this.pending.has(sessionName);
  }

  addCompletionListener<K extends OperationKind>(kind: K, listener: CompletionListener<K>): ListenerHandle {
    const handle = genId(`on-${kind}`);
    this.listeners[kind].set(handle, listener);
    return handle;
  }

  removeCompletionListener(kind: OperationKind, handle: ListenerHandle): void {
    this.listeners[kind].delete(handle);
  }

  listenerCount(kind: OperationKind): number {
    return this.listeners[kind].size;
  }

  /** Deliver a completion to every listener registered for the kind. */
  protected complete<K extends OperationKind>(kind: K, completion: BackendCompletions[K]): void {
    const current: CompletionListener<K>[] = [...this.listeners[kind].values()];
    for (const listener of current) {
      try {
        listener(completion);
      } catch (err) {
        this.logger.error({ err, kind }, "completion listener threw");
      }
    }
  }
}
