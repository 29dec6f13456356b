import { EventEmitter } from "node:events";
import { componentLogger } from "../shared/logging.js";
import type { OperationEvent, OperationKind } from "./types.js";

export type NotificationListener<K extends OperationKind> = (event: OperationEvent<K>) => void;

/**
 * One broadcast channel per operation kind. Subscribers are optional and only
 * see events published after they subscribed.
 */
export class NotificationBus {
  private readonly emitter = new EventEmitter();
  private readonly logger = componentLogger("bus");

  constructor() {
    this.emitter.setMaxListeners(100);
  }

  publish<K extends OperationKind>(kind: K, event: OperationEvent<K>): void {
    for (const listener of this.emitter.listeners(kind)) {
      try {
        listener(event);
      } catch (err) {
        this.logger.error({ err, kind }, "notification listener threw");
      }
    }
  }

  subscribe<K extends OperationKind>(kind: K, listener: NotificationListener<K>): () => void {
    this.emitter.on(kind, listener);
    return () => this.emitter.off(kind, listener);
  }

  listenerCount(kind: OperationKind): number {
    return this.emitter.listenerCount(kind);
  }
}
