/**
 * auth-fence.ts — Identity + monotonic generation counter.
 *
 * Long-running work captures the generation before it starts and checks
 * it at each checkpoint (before a network call, after it, before each
 * batch). Any identity change bumps the generation, so work started for
 * one user cannot commit into caches that now serve another.
 *
 *   const { ownerId, generation } = fence.begin();
 *   const docs = await remote.query(...);
 *   fence.checkUnchanged(generation);   // throws AuthStateChangedError
 */

import { AuthStateChangedError, NotAuthenticatedError } from "../errors.js";
import { log } from "../logger.js";
import type { IdentityProvider } from "../stores/types.js";

// ─── Types ──────────────────────────────────────────────────

export interface IdentityChange {
  previous: string | null;
  identity: string | null;
  generation: number;
}

export type IdentityListener = (change: IdentityChange) => void;

/** Identity and generation captured together at the start of an operation. */
export interface FenceTicket {
  ownerId: string;
  generation: number;
}

// ─── Fence ──────────────────────────────────────────────────

export class AuthFence {
  private generation = 0;
  private identity: string | null;
  private readonly listeners = new Set<IdentityListener>();

  constructor(initialIdentity: string | null = null) {
    this.identity = initialIdentity;
  }

  captureGeneration(): number {
    return this.generation;
  }

  checkUnchanged(since: number): void {
    if (this.generation !== since) {
      throw new AuthStateChangedError(since, this.generation);
    }
  }

  currentIdentity(): string | null {
    return this.identity;
  }

  requireIdentity(): string {
    if (this.identity === null) throw new NotAuthenticatedError();
    return this.identity;
  }

  /** requireIdentity() + captureGeneration() in one step. */
  begin(): FenceTicket {
    return { ownerId: this.requireIdentity(), generation: this.generation };
  }

  /**
   * Record an identity-changed event from the provider. Always bumps the
   * generation, even for the same identity (a re-sign-in invalidates work
   * started under the previous session).
   */
  onIdentityChanged(identity: string | null): void {
    const previous = this.identity;
    this.generation += 1;
    this.identity = identity;
    log.auth.info(
      { generation: this.generation, signedIn: identity !== null, switched: previous !== identity },
      "auth:identity-changed",
    );

    const change: IdentityChange = { previous, identity, generation: this.generation };
    for (const listener of [...this.listeners]) {
      try {
        listener(change);
      } catch (err) {
        log.auth.error({ err }, "auth:listener-failed");
      }
    }
  }

  subscribe(listener: IdentityListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Follow an identity provider: adopt its current identity if it differs,
   * then forward every change. Returns the provider's unsubscribe.
   */
  bind(provider: IdentityProvider): () => void {
    const current = provider.currentIdentity();
    if (current !== this.identity) this.onIdentityChanged(current);
    return provider.subscribe((identity) => this.onIdentityChanged(identity));
  }
}
