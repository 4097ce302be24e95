// Types for the withdrawal pool (settled amounts awaiting payout)

/**
 * Running totals across every account.
 *
 * `totalWithdrawn` never exceeds `totalCredited`; `outstanding` is the
 * difference and equals the sum of all pending balances.
 */
export interface PoolTotals {
  totalStaked: bigint;     // principal held by active stakes
  activeStakers: number;
  totalCredited: bigint;   // principal + reward ever credited to the pool
  totalWithdrawn: bigint;  // amount ever paid out of the pool
  outstanding: bigint;
}
