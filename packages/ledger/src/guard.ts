import { LedgerInvariantError } from "./errors";

/**
 * Per-account in-flight marker. An account holds the guard for as long as one
 * of its operations is waiting on the gateway; anything else touching that
 * account meanwhile is rejected rather than interleaved.
 */
export class AccountGuard {
  private readonly held = new Set<string>();

  isHeld(account: string): boolean {
    return this.held.has(account);
  }

  /** Run `fn` holding the guard for `account`. The caller checks `isHeld` first. */
  async hold<T>(account: string, fn: () => Promise<T>): Promise<T> {
    if (this.held.has(account)) {
      throw new LedgerInvariantError(`guard for ${account} is already held`);
    }
    this.held.add(account);
    try {
      return await fn();
    } finally {
      this.held.delete(account);
    }
  }
}
