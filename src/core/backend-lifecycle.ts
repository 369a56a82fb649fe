/**
 * Backend Lifecycle -- state machine for a lighting backend instance.
 *
 * A backend starts "uninitialized", moves through "initializing" while the
 * handshake is in flight and becomes "active" once it has a session. A failed
 * handshake falls back to "uninitialized". "disposed" is terminal.
 *
 * @module BackendControl
 */

import { InvalidStateError } from "../errors.js";

export const BACKEND_LIFECYCLE_STATES = [
  "uninitialized",
  "initializing",
  "active",
  "disposed",
] as const;

export type BackendLifecycleState = (typeof BACKEND_LIFECYCLE_STATES)[number];

const ALLOWED_TRANSITIONS: Record<BackendLifecycleState, ReadonlySet<BackendLifecycleState>> = {
  uninitialized: new Set(["initializing", "disposed"]),
  initializing: new Set(["active", "uninitialized", "disposed"]),
  active: new Set(["disposed"]),
  disposed: new Set(),
};

export function isBackendTransitionAllowed(
  from: BackendLifecycleState,
  to: BackendLifecycleState,
): boolean {
  return ALLOWED_TRANSITIONS[from].has(to);
}

/**
 * Holds the current lifecycle state and rejects illegal transitions.
 * Transitions are synchronous, so a check-then-switch never interleaves with
 * another caller.
 */
export class BackendLifecycle {
  private current: BackendLifecycleState = "uninitialized";

  get state(): BackendLifecycleState {
    return this.current;
  }

  get isActive(): boolean {
    return this.current === "active";
  }

  get isDisposed(): boolean {
    return this.current === "disposed";
  }

  /** Switch to `to`, or throw `InvalidStateError` naming `operation`. */
  transition(to: BackendLifecycleState, operation: string): void {
    if (!isBackendTransitionAllowed(this.current, to)) {
      throw new InvalidStateError(operation, this.current);
    }
    this.current = to;
  }

  /** Throw unless the backend is active. */
  assertActive(operation: string): void {
    if (this.current !== "active") {
      throw new InvalidStateError(operation, this.current);
    }
  }
}
