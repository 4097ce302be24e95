/**
 * gateway.ts
 *
 * The ledger never holds the asset itself. Deposits into custody and payouts
 * out of it go through a TokenGateway. An outcome is `ok` only once the
 * transfer has executed; a failed transfer must leave no side effect on the
 * gateway's side.
 */

export type TransferOutcome =
  | { ok: true; reference?: string }   // e.g. a txid
  | { ok: false; reason: string };

export interface TokenGateway {
  /** Move `amount` from `from` into custody. */
  deposit(from: string, amount: bigint): Promise<TransferOutcome>;
  /** Move `amount` out of custody to `to`. */
  payout(to: string, amount: bigint): Promise<TransferOutcome>;
}

/** Run a gateway call, turning a thrown error into a failed outcome. */
export async function settle(transfer: () => Promise<TransferOutcome>): Promise<TransferOutcome> {
  try {
    return await transfer();
  } catch (err) {
    return { ok: false, reason: err instanceof Error ? err.message : String(err) };
  }
}

/**
 * In-process custody: wallet balances per account plus one custody balance.
 * Used for local runs without a custody contract, and in tests.
 */
export class MemoryTokenGateway implements TokenGateway {
  private readonly wallets = new Map<string, bigint>();
  private custody = 0n;
  private nextRef = 0;

  /** Give `account` spendable balance outside custody. */
  fund(account: string, amount: bigint): void {
    this.wallets.set(account, this.balanceOf(account) + amount);
  }

  /** Add to custody directly, e.g. the reserve rewards are paid from. */
  fundCustody(amount: bigint): void {
    this.custody += amount;
  }

  balanceOf(account: string): bigint {
    return this.wallets.get(account) ?? 0n;
  }

  custodyBalance(): bigint {
    return this.custody;
  }

  async deposit(from: string, amount: bigint): Promise<TransferOutcome> {
    const balance = this.balanceOf(from);
    if (balance < amount) {
      return { ok: false, reason: `insufficient balance: ${from} holds ${balance}, needs ${amount}` };
    }
    this.wallets.set(from, balance - amount);
    this.custody += amount;
    return { ok: true, reference: this.reference() };
  }

  async payout(to: string, amount: bigint): Promise<TransferOutcome> {
    if (this.custody < amount) {
      return { ok: false, reason: `insufficient custody: holds ${this.custody}, needs ${amount}` };
    }
    this.custody -= amount;
    this.wallets.set(to, this.balanceOf(to) + amount);
    return { ok: true, reference: this.reference() };
  }

  private reference(): string {
    this.nextRef += 1;
    return `mem-${this.nextRef}`;
  }
}
