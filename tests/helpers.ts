import {
  ManualClock,
  MemoryEventLog,
  MemoryTokenGateway,
  StakingEngine,
  type TokenGateway,
} from "@blockstake/ledger";

// Clarinet devnet accounts
export const OWNER    = "ST1PQHQKV0RJXZFY1DGX8MNSNYVE3VGZJSRTPGZGM";
export const WALLET_1 = "ST1SJ3DTE5DN7X54YDH5D64R3BCB6A2AG2ZQ8YPD5";
export const WALLET_2 = "ST2CY5V39NHDPWSXMW9QDT3HC3GD6Q6XX4CFRK9AG";

export const PAYOUT_GAP    = 10n;
export const MINIMUM_STAKE = 50n;
export const WALLET_FUNDS  = 1_000n;
export const REWARD_RESERVE = 1_000n;

export interface Harness {
  engine: StakingEngine;
  clock: ManualClock;
  custody: MemoryTokenGateway;
  log: MemoryEventLog;
}

/**
 * Engine at block 0 with the wallets funded (WALLET_1 and WALLET_2 unless
 * `wallets` names others) and a reward reserve in custody. Pass `gateway` to
 * put something in front of the custody.
 */
export function setup(
  opts: {
    owner?: string;
    wallets?: string[];
    minimumStake?: bigint;
    gateway?: (custody: MemoryTokenGateway) => TokenGateway;
    reserve?: bigint;
  } = {}
): Harness {
  const clock = new ManualClock(0n);
  const custody = new MemoryTokenGateway();
  for (const wallet of opts.wallets ?? [WALLET_1, WALLET_2]) {
    custody.fund(wallet, WALLET_FUNDS);
  }
  custody.fundCustody(opts.reserve ?? REWARD_RESERVE);
  const log = new MemoryEventLog();

  const engine = new StakingEngine({
    owner: opts.owner ?? OWNER,
    payoutGap: PAYOUT_GAP,
    minimumStake: opts.minimumStake ?? MINIMUM_STAKE,
    gateway: opts.gateway ? opts.gateway(custody) : custody,
    clock,
    eventLog: log,
  });

  return { engine, clock, custody, log };
}
