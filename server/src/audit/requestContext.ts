import { AsyncLocalStorage } from "node:async_hooks";

import type { UserRole } from "../models/User.js";

/** The authenticated principal behind the current request. */
export type Actor = {
  id: string;
  username: string;
  role: UserRole;
};

export type ActorSource = {
  get(): Actor | null;
};

type Scope = { actor: Actor | null };

/**
 * Per-request actor slot. Each `run` call gets its own scope that follows the
 * async continuations started inside it, so concurrent requests never see each
 * other's actor.
 */
export class RequestContext implements ActorSource {
  private readonly storage = new AsyncLocalStorage<Scope>();

  /**
   * Runs `fn` inside a fresh scope. `end` clears that scope from anywhere,
   * including callbacks that fire outside it such as response events.
   */
  run<T>(fn: (end: () => void) => T): T {
    const scope: Scope = { actor: null };
    return this.storage.run(scope, () =>
      fn(() => {
        scope.actor = null;
      })
    );
  }

  /** Ignored outside a `run` scope. */
  set(actor: Actor): void {
    const scope = this.storage.getStore();
    if (scope) scope.actor = actor;
  }

  get(): Actor | null {
    return this.storage.getStore()?.actor ?? null;
  }

  clear(): void {
    const scope = this.storage.getStore();
    if (scope) scope.actor = null;
  }
}
