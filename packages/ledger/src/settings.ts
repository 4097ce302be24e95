import type { LedgerSettingsView } from "@blockstake/types";
import { fail, ok, type Result } from "./errors";

export interface LedgerSettingsInit {
  owner: string;
  payoutGap: bigint;
  minimumStake: bigint;
}

/**
 * Global configuration. `owner` and `payoutGap` are fixed at construction;
 * only the owner can move `minimumStake`, and a new minimum applies to
 * future stakes only.
 */
export class LedgerSettings {
  readonly owner: string;
  readonly payoutGap: bigint;
  private minStake: bigint;

  constructor(init: LedgerSettingsInit) {
    if (init.owner.length === 0) throw new Error("owner must be set");
    if (init.payoutGap <= 0n) throw new Error(`payoutGap must be positive, got ${init.payoutGap}`);
    if (init.minimumStake < 0n) throw new Error(`minimumStake must not be negative, got ${init.minimumStake}`);

    this.owner = init.owner;
    this.payoutGap = init.payoutGap;
    this.minStake = init.minimumStake;
  }

  get minimumStake(): bigint {
    return this.minStake;
  }

  /** Returns the previous minimum. */
  setMinimumStake(caller: string, amount: bigint): Result<bigint> {
    if (caller !== this.owner) {
      return fail("Unauthorized", `${caller} is not the owner`);
    }
    if (amount < 0n) {
      return fail("InvalidAmount", `minimum stake must not be negative, got ${amount}`);
    }
    const previous = this.minStake;
    this.minStake = amount;
    return ok(previous);
  }

  /** Apply a journaled change; the owner check already passed when it was recorded. */
  replayMinimumStake(amount: bigint): void {
    if (amount < 0n) throw new Error(`minimumStake must not be negative, got ${amount}`);
    this.minStake = amount;
  }

  view(): LedgerSettingsView {
    return { owner: this.owner, payoutGap: this.payoutGap, minimumStake: this.minStake };
  }
}
