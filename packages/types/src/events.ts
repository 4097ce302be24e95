// Audit events produced by the ledger

interface EventBase {
  sequence: number;     // 1-based, strictly increasing per engine
  blockHeight: bigint;  // clock reading of the operation that emitted it
}

export interface StakeEvent extends EventBase {
  type: "Stake";
  account: string;
  amount: bigint;
}

export interface ClaimEvent extends EventBase {
  type: "Claim";
  account: string;
  amount: bigint;
}

export interface UnstakeEvent extends EventBase {
  type: "Unstake";
  account: string;
  amount: bigint;  // principal moved to the withdrawal pool
}

export interface WithdrawEvent extends EventBase {
  type: "Withdraw";
  account: string;
  amount: bigint;
}

export interface MinimumStakeChangedEvent extends EventBase {
  type: "MinimumStakeChanged";
  previous: bigint;
  next: bigint;
}

export type LedgerEvent =
  | StakeEvent
  | ClaimEvent
  | UnstakeEvent
  | WithdrawEvent
  | MinimumStakeChangedEvent;

export type LedgerEventType = LedgerEvent["type"];
