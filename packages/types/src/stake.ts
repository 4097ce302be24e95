// Types for the per-account stake ledger

/**
 * An account's stake record.
 *
 * An account with no stored record is in the zero/inactive form, so every
 * account implicitly has one. Records are reset, never removed.
 */
export interface UserStake {
  stakeAmount: bigint;            // locked principal; 0 when inactive
  stakeStartBlockNumber: bigint;  // block height the current stake period began; 0 when inactive
  claimed: bigint;                // reward already moved to the withdrawal pool this period
  active: boolean;
}

/**
 * A stake together with the amounts derived from it at a given block.
 */
export interface StakePosition extends UserStake {
  account: string;
  blockHeight: bigint;
  earned: bigint;             // whole reward units accrued since stakeStartBlockNumber
  claimable: bigint;          // earned - claimed
  pendingWithdrawal: bigint;  // balance waiting in the withdrawal pool
}

export interface LedgerSettingsView {
  owner: string;
  payoutGap: bigint;     // blocks per reward unit; fixed at construction
  minimumStake: bigint;  // applies to new stakes only
}
