/**
 * reward-calculator.ts
 *
 * Rewards accrue one whole unit per full payout gap of block height. A stake
 * open for exactly `payoutGap` blocks has earned nothing yet; the first unit
 * appears at `payoutGap + 1`.
 */

import type { UserStake } from "@blockstake/types";
import { LedgerInvariantError } from "./errors";

export function earned(stake: UserStake, currentBlock: bigint, payoutGap: bigint): bigint {
  if (!stake.active) return 0n;

  const blockDiff = currentBlock - stake.stakeStartBlockNumber;
  if (blockDiff < 0n) {
    throw new LedgerInvariantError(
      `block ${currentBlock} is before stake start ${stake.stakeStartBlockNumber}`
    );
  }
  if (blockDiff <= payoutGap) return 0n;

  // bigint division truncates, which is floor for non-negative operands
  return blockDiff / payoutGap;
}

/** Earned reward not yet moved to the withdrawal pool. Never negative. */
export function claimable(stake: UserStake, currentBlock: bigint, payoutGap: bigint): bigint {
  const total = earned(stake, currentBlock, payoutGap);
  if (total === 0n || stake.claimed >= total) return 0n;
  return total - stake.claimed;
}
