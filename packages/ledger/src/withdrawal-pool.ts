/**
 * withdrawal-pool.ts
 *
 * Settled amounts (claimed rewards and returned principal) wait here until
 * the account withdraws them. Payouts read and write pool balances only,
 * never stake records.
 */

import type { KeyValueStore } from "./store";
import type { TokenGateway } from "./gateway";
import { settle } from "./gateway";
import type { EventRecorder } from "./events";
import type { LedgerLogger } from "./logger";
import { LedgerInvariantError, fail, ok, type Result } from "./errors";

export interface PoolLedgerTotals {
  totalCredited: bigint;
  totalWithdrawn: bigint;
  outstanding: bigint;
}

export class WithdrawalPool {
  private totalCredited = 0n;
  private totalWithdrawn = 0n;

  constructor(
    private readonly balances: KeyValueStore<bigint>,
    private readonly gateway: TokenGateway,
    private readonly recorder: EventRecorder,
    private readonly logger: LedgerLogger
  ) {}

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  /** Add `amount` to the account's pending balance. Callers never pass 0. */
  credit(account: string, amount: bigint): bigint {
    if (amount <= 0n) {
      throw new LedgerInvariantError(`pool credit must be positive, got ${amount} for ${account}`);
    }
    const next = this.balanceOf(account) + amount;
    this.balances.set(account, next);
    this.totalCredited += amount;
    return next;
  }

  /**
   * Pay the whole pending balance out to the account.
   *
   * The balance is zeroed before the gateway is called, so anything observing
   * the pool during the transfer sees it empty. A failed transfer puts the
   * amount back.
   */
  async withdraw(account: string, blockHeight: bigint): Promise<Result<bigint>> {
    const amount = this.balanceOf(account);
    if (amount === 0n) {
      return fail("EmptyWithdrawPool", `nothing pending for ${account}`);
    }

    this.balances.set(account, 0n);

    const outcome = await settle(() => this.gateway.payout(account, amount));
    if (!outcome.ok) {
      this.balances.set(account, this.balanceOf(account) + amount);
      this.logger.warn(`payout of ${amount} to ${account} failed: ${outcome.reason}`);
      return fail("TransferFailed", `payout failed: ${outcome.reason}`);
    }

    this.totalWithdrawn += amount;
    this.recorder.emit({ type: "Withdraw", account, amount }, blockHeight);
    this.logger.info(`withdraw ${account}: ${amount}${outcome.reference ? ` (${outcome.reference})` : ""}`);
    return ok(amount);
  }

  /** Apply a journaled withdrawal: the balance it paid out is gone. */
  replayWithdraw(account: string, amount: bigint): void {
    const balance = this.balanceOf(account);
    if (amount <= 0n || amount > balance) {
      throw new LedgerInvariantError(`journaled withdraw of ${amount} for ${account} exceeds pending ${balance}`);
    }
    this.balances.set(account, balance - amount);
    this.totalWithdrawn += amount;
  }

  totals(): PoolLedgerTotals {
    return {
      totalCredited: this.totalCredited,
      totalWithdrawn: this.totalWithdrawn,
      outstanding: this.totalCredited - this.totalWithdrawn,
    };
  }
}
