/**
 * engine.ts
 *
 * Entry point for callers. Reads the clock once per operation, rejects
 * operations on an account that already has one waiting on the gateway, and
 * delegates to the ledger, the pool and the settings.
 */

import type {
  LedgerEvent,
  LedgerSettingsView,
  PoolTotals,
  StakePosition,
  UserStake,
} from "@blockstake/types";
import type { BlockClock } from "./clock";
import type { TokenGateway } from "./gateway";
import type { KeyValueStore } from "./store";
import { MemoryStore } from "./store";
import { EventRecorder, MemoryEventLog, type EventLog } from "./events";
import { AccountGuard } from "./guard";
import { silentLogger, type LedgerLogger } from "./logger";
import { LedgerSettings } from "./settings";
import { StakeLedger, type UnstakeReceipt } from "./stake-ledger";
import { WithdrawalPool } from "./withdrawal-pool";
import { fail, ok, type Result } from "./errors";

export interface StakingEngineOptions {
  owner: string;
  payoutGap: bigint;
  minimumStake: bigint;
  gateway: TokenGateway;
  clock: BlockClock;
  eventLog?: EventLog;
  stakes?: KeyValueStore<UserStake>;
  balances?: KeyValueStore<bigint>;
  logger?: LedgerLogger;
}

export class StakingEngine {
  readonly eventLog: EventLog;

  private readonly settings: LedgerSettings;
  private readonly clock: BlockClock;
  private readonly guard = new AccountGuard();
  private readonly recorder: EventRecorder;
  private readonly pool: WithdrawalPool;
  private readonly ledger: StakeLedger;

  constructor(options: StakingEngineOptions) {
    const logger = options.logger ?? silentLogger;

    this.settings = new LedgerSettings(options);
    this.clock = options.clock;
    this.eventLog = options.eventLog ?? new MemoryEventLog();
    this.recorder = new EventRecorder(this.eventLog);
    this.pool = new WithdrawalPool(
      options.balances ?? new MemoryStore<bigint>(),
      options.gateway,
      this.recorder,
      logger
    );
    this.ledger = new StakeLedger({
      stakes: options.stakes ?? new MemoryStore<UserStake>(),
      pool: this.pool,
      gateway: options.gateway,
      settings: this.settings,
      recorder: this.recorder,
      logger,
    });
  }

  // -----------------------------------------------------------------------
  // Operations
  // -----------------------------------------------------------------------

  async stake(account: string, amount: bigint): Promise<Result<UserStake>> {
    if (this.guard.isHeld(account)) return this.reentrant(account);
    const blockHeight = this.clock.currentBlock();
    return this.guard.hold(account, () => this.ledger.stake(account, amount, blockHeight));
  }

  claim(account: string): Result<bigint> {
    if (this.guard.isHeld(account)) return this.reentrant(account);
    return this.ledger.claim(account, this.clock.currentBlock());
  }

  unstake(account: string): Result<UnstakeReceipt> {
    if (this.guard.isHeld(account)) return this.reentrant(account);
    return this.ledger.unstake(account, this.clock.currentBlock());
  }

  async withdraw(account: string): Promise<Result<bigint>> {
    if (this.guard.isHeld(account)) return this.reentrant(account);
    const blockHeight = this.clock.currentBlock();
    return this.guard.hold(account, () => this.pool.withdraw(account, blockHeight));
  }

  setMinimumStake(caller: string, amount: bigint): Result<bigint> {
    const changed = this.settings.setMinimumStake(caller, amount);
    if (!changed.ok) return changed;
    this.recorder.emit(
      { type: "MinimumStakeChanged", previous: changed.value, next: amount },
      this.clock.currentBlock()
    );
    return ok(amount);
  }

  /**
   * Rebuild stakes, pool balances and the minimum stake from a previously
   * journaled event stream, before the engine takes any operation. Events are
   * applied as facts: nothing is re-emitted and the gateway is not called.
   * Returns the number of events applied.
   */
  restore(events: Iterable<LedgerEvent>): number {
    let applied = 0;
    for (const event of events) {
      this.recorder.resume(event.sequence);
      switch (event.type) {
        case "Stake":
          this.ledger.replay(event);
          break;
        case "Claim":
        case "Unstake":
          this.ledger.replay(event);
          this.pool.credit(event.account, event.amount);
          break;
        case "Withdraw":
          this.pool.replayWithdraw(event.account, event.amount);
          break;
        case "MinimumStakeChanged":
          this.settings.replayMinimumStake(event.next);
          break;
      }
      applied += 1;
    }
    return applied;
  }

  // -----------------------------------------------------------------------
  // Views
  //
  // A stake whose deposit is still in flight is not reported until the
  // deposit succeeds.
  // -----------------------------------------------------------------------

  currentBlock(): bigint {
    return this.clock.currentBlock();
  }

  get minimumStake(): bigint {
    return this.settings.minimumStake;
  }

  getStake(account: string): UserStake {
    return this.ledger.settledStake(account);
  }

  earned(account: string): bigint {
    return this.ledger.earned(account, this.clock.currentBlock());
  }

  claimable(account: string): bigint {
    return this.ledger.claimable(account, this.clock.currentBlock());
  }

  pendingWithdrawal(account: string): bigint {
    return this.pool.balanceOf(account);
  }

  position(account: string): StakePosition {
    const blockHeight = this.clock.currentBlock();
    return {
      account,
      blockHeight,
      ...this.ledger.settledStake(account),
      earned: this.ledger.earned(account, blockHeight),
      claimable: this.ledger.claimable(account, blockHeight),
      pendingWithdrawal: this.pool.balanceOf(account),
    };
  }

  totals(): PoolTotals {
    return { ...this.ledger.activeTotals(), ...this.pool.totals() };
  }

  settingsView(): LedgerSettingsView {
    return this.settings.view();
  }

  private reentrant(account: string): Result<never> {
    return fail("ReentrantCall", `${account} has an operation in flight`);
  }
}
