export { StakingEngine, type StakingEngineOptions } from "./engine";
export { StakeLedger, EMPTY_STAKE, type UnstakeReceipt, type StakeLedgerDeps } from "./stake-ledger";
export { WithdrawalPool, type PoolLedgerTotals } from "./withdrawal-pool";
export { LedgerSettings, type LedgerSettingsInit } from "./settings";
export { earned, claimable } from "./reward-calculator";
export { AccountGuard } from "./guard";
export { ManualClock, type BlockClock } from "./clock";
export { MemoryStore, type KeyValueStore } from "./store";
export { MemoryEventLog, EventRecorder, type EventLog, type EventPayload } from "./events";
export { MemoryTokenGateway, settle, type TokenGateway, type TransferOutcome } from "./gateway";
export { silentLogger, type LedgerLogger } from "./logger";
export {
  ErrorCode,
  LedgerInvariantError,
  ok,
  fail,
  type ErrorKind,
  type LedgerFailure,
  type Result,
} from "./errors";
