/**
 * fake-identity.ts — Settable IdentityProvider for tests
 */

import type { IdentityProvider } from "../../src/stores/types.js";

export class FakeIdentityProvider implements IdentityProvider {
  private identity: string | null;
  private readonly listeners = new Set<(identity: string | null) => void>();

  constructor(initial: string | null = null) {
    this.identity = initial;
  }

  currentIdentity(): string | null {
    return this.identity;
  }

  subscribe(onChange: (identity: string | null) => void): () => void {
    this.listeners.add(onChange);
    return () => {
      this.listeners.delete(onChange);
    };
  }

  /** Switch identity and notify subscribers (null = sign-out). */
  set(identity: string | null): void {
    this.identity = identity;
    for (const listener of [...this.listeners]) listener(identity);
  }

  get subscriberCount(): number {
    return this.listeners.size;
  }
}
