/**
 * stake-ledger.ts
 *
 * Per-account state machine: Inactive -> stake -> Active -> unstake -> Inactive.
 * Accounts may stake again after unstaking.
 *
 * Ordering matters in two places:
 *   - stake() commits the Active record before asking the gateway for the
 *     deposit, and restores the previous record if the deposit fails.
 *   - unstake() settles everything into the withdrawal pool and never calls
 *     the gateway; the principal leaves custody only on withdraw.
 */

import type { ClaimEvent, StakeEvent, UnstakeEvent, UserStake } from "@blockstake/types";
import type { KeyValueStore } from "./store";
import type { TokenGateway } from "./gateway";
import { settle } from "./gateway";
import type { EventRecorder } from "./events";
import type { LedgerLogger } from "./logger";
import type { LedgerSettings } from "./settings";
import type { WithdrawalPool } from "./withdrawal-pool";
import * as rewards from "./reward-calculator";
import { LedgerInvariantError, fail, ok, type Result } from "./errors";

export const EMPTY_STAKE: Readonly<UserStake> = Object.freeze({
  stakeAmount: 0n,
  stakeStartBlockNumber: 0n,
  claimed: 0n,
  active: false,
});

export interface UnstakeReceipt {
  principal: bigint;
  reward: bigint;  // claimable settled on the way out; may be 0
}

export interface StakeLedgerDeps {
  stakes: KeyValueStore<UserStake>;
  pool: WithdrawalPool;
  gateway: TokenGateway;
  settings: LedgerSettings;
  recorder: EventRecorder;
  logger: LedgerLogger;
}

export class StakeLedger {
  // Accounts whose Active record is committed but whose deposit has not settled
  private readonly depositing = new Set<string>();

  constructor(private readonly deps: StakeLedgerDeps) {}

  /** The stored record, or the zero form for an account never seen. */
  getStake(account: string): UserStake {
    const stored = this.deps.stakes.get(account);
    return stored ? { ...stored } : { ...EMPTY_STAKE };
  }

  /** Like getStake, but an account whose deposit is in flight reads as inactive. */
  settledStake(account: string): UserStake {
    return this.depositing.has(account) ? { ...EMPTY_STAKE } : this.getStake(account);
  }

  earned(account: string, blockHeight: bigint): bigint {
    return rewards.earned(this.settledStake(account), blockHeight, this.deps.settings.payoutGap);
  }

  claimable(account: string, blockHeight: bigint): bigint {
    return rewards.claimable(this.settledStake(account), blockHeight, this.deps.settings.payoutGap);
  }

  async stake(account: string, amount: bigint, blockHeight: bigint): Promise<Result<UserStake>> {
    const { stakes, gateway, settings, recorder, logger } = this.deps;

    if (this.getStake(account).active) {
      return fail("AlreadyStaked", `${account} already has an active stake`);
    }
    if (amount <= 0n || amount < settings.minimumStake) {
      return fail("InvalidAmount", `stake of ${amount} is below the minimum of ${settings.minimumStake}`);
    }

    const previous = stakes.get(account);
    const next: UserStake = {
      stakeAmount: amount,
      stakeStartBlockNumber: blockHeight,
      claimed: 0n,
      active: true,
    };
    stakes.set(account, next);

    this.depositing.add(account);
    const outcome = await settle(() => gateway.deposit(account, amount));
    this.depositing.delete(account);
    if (!outcome.ok) {
      if (previous) stakes.set(account, previous);
      else stakes.delete(account);
      logger.warn(`deposit of ${amount} from ${account} failed: ${outcome.reason}`);
      return fail("TransferFailed", `deposit failed: ${outcome.reason}`);
    }

    recorder.emit({ type: "Stake", account, amount }, blockHeight);
    logger.info(`stake ${account}: ${amount} at block ${blockHeight}`);
    return ok({ ...next });
  }

  claim(account: string, blockHeight: bigint): Result<bigint> {
    const current = this.getStake(account);
    if (!current.active) {
      return fail("NoActiveStake", `${account} has no active stake`);
    }

    const amount = rewards.claimable(current, blockHeight, this.deps.settings.payoutGap);
    if (amount === 0n) {
      return fail("NothingToClaim", `${account} has nothing to claim at block ${blockHeight}`);
    }

    this.settleReward(account, current, amount, blockHeight);
    return ok(amount);
  }

  unstake(account: string, blockHeight: bigint): Result<UnstakeReceipt> {
    const { stakes, pool, settings, recorder, logger } = this.deps;

    const current = this.getStake(account);
    if (!current.active) {
      return fail("NoActiveStake", `${account} has no active stake`);
    }

    // Zero claimable is not an error here, unlike claim()
    const reward = rewards.claimable(current, blockHeight, settings.payoutGap);
    if (reward > 0n) {
      this.settleReward(account, current, reward, blockHeight);
    }

    const principal = current.stakeAmount;
    pool.credit(account, principal);
    stakes.set(account, { ...EMPTY_STAKE });

    recorder.emit({ type: "Unstake", account, amount: principal }, blockHeight);
    logger.info(`unstake ${account}: principal ${principal}, reward ${reward}`);
    return ok({ principal, reward });
  }

  /** Sum of principal held by active stakes, and how many there are. */
  activeTotals(): { totalStaked: bigint; activeStakers: number } {
    let totalStaked = 0n;
    let activeStakers = 0;
    for (const [account, stake] of this.deps.stakes.entries()) {
      if (!stake.active || this.depositing.has(account)) continue;
      totalStaked += stake.stakeAmount;
      activeStakers += 1;
    }
    return { totalStaked, activeStakers };
  }

  /** Apply a journaled event to the stake records. Pool credits are the pool's concern. */
  replay(event: StakeEvent | ClaimEvent | UnstakeEvent): void {
    const { stakes } = this.deps;
    switch (event.type) {
      case "Stake":
        stakes.set(event.account, {
          stakeAmount: event.amount,
          stakeStartBlockNumber: event.blockHeight,
          claimed: 0n,
          active: true,
        });
        return;
      case "Claim": {
        const current = this.getStake(event.account);
        if (!current.active) {
          throw new LedgerInvariantError(`journaled claim #${event.sequence} for ${event.account} has no active stake`);
        }
        stakes.set(event.account, { ...current, claimed: current.claimed + event.amount });
        return;
      }
      case "Unstake":
        stakes.set(event.account, { ...EMPTY_STAKE });
        return;
    }
  }

  private settleReward(account: string, current: UserStake, amount: bigint, blockHeight: bigint): void {
    this.deps.stakes.set(account, { ...current, claimed: current.claimed + amount });
    this.deps.pool.credit(account, amount);
    this.deps.recorder.emit({ type: "Claim", account, amount }, blockHeight);
    this.deps.logger.debug(`claim ${account}: ${amount} at block ${blockHeight}`);
  }
}
