import type { ListenerHandle, SessionBackend } from "./backend.js";
import { OPERATION_KINDS, type OperationKind } from "./types.js";

export interface OperationSubscription {
  readonly kind: OperationKind;
  handle: ListenerHandle | null;
  active: boolean;
}

/** One subscription slot per operation kind; at most one active at a time. */
export class SubscriptionSlots {
  private readonly slots = new Map<OperationKind, OperationSubscription>(
    OPERATION_KINDS.map((kind) => [kind, { kind, handle: null, active: false }])
  );

  private slot(kind: OperationKind): OperationSubscription {
    const slot = this.slots.get(kind);
    if (!slot) throw new Error(`Unknown operation kind: ${kind}`);
    return slot;
  }

  isActive(kind: OperationKind): boolean {
    return this.slot(kind).active;
  }

  /** Mark the slot pending before the backend listener is registered. */
  reserve(kind: OperationKind): void {
    const slot = this.slot(kind);
    if (slot.active) throw new Error(`Subscription for ${kind} is already active`);
    slot.active = true;
    slot.handle = null;
  }

  attach(kind: OperationKind, handle: ListenerHandle): void {
    this.slot(kind).handle = handle;
  }

  /** Remove the backend listener (if any) and mark the slot inactive. Safe to call twice. */
  release(kind: OperationKind, backend: SessionBackend | undefined): void {
    const slot = this.slot(kind);
    if (slot.handle !== null && backend) {
      backend.removeCompletionListener(kind, slot.handle);
    }
    slot.handle = null;
    slot.active = false;
  }

  snapshot(): OperationSubscription[] {
    return OPERATION_KINDS.map((kind) => ({ ...this.slot(kind) }));
  }
}
