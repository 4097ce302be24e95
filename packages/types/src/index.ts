export type { UserStake, StakePosition, LedgerSettingsView } from "./stake";
export type { PoolTotals } from "./pool";
export type {
  StakeEvent,
  ClaimEvent,
  UnstakeEvent,
  WithdrawEvent,
  MinimumStakeChangedEvent,
  LedgerEvent,
  LedgerEventType,
} from "./events";
