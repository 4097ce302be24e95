import "dotenv/config";

function uintEnv(name: string, fallback: bigint): bigint {
  const raw = process.env[name];
  if (raw === undefined || raw === "") return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  return BigInt(raw);
}

function msEnv(name: string, fallback: number): number {
  const value = uintEnv(name, BigInt(fallback));
  if (value === 0n) throw new Error(`${name} must be positive, got "0"`);
  return Number(value);
}

function portEnv(name: string, fallback: number): number {
  const value = uintEnv(name, BigInt(fallback));
  if (value > 65_535n) throw new Error(`${name} must be a TCP port, got "${value}"`);
  return Number(value);
}

export const config = {
  network: process.env.STACKS_NETWORK ?? "devnet",
  apiUrl: process.env.STACKS_API_URL ?? "http://localhost:3999",

  // Hex-encoded Stacks private key of the custody wallet.
  // This account must be the operator of the custody contract, which is
  // the only principal allowed to call escrow/release on it.
  custodyPrivateKey: process.env.CUSTODY_PRIVATE_KEY ?? "",

  contracts: {
    // Left empty in devnet to run against in-process custody.
    custody: process.env.CUSTODY_CONTRACT_ADDRESS ?? "",
  },

  ledger: {
    owner: process.env.LEDGER_OWNER ?? "",
    // ~1 day of Stacks blocks at 10 min/block.
    payoutGap: uintEnv("PAYOUT_GAP", 144n),
    minimumStake: uintEnv("MINIMUM_STAKE", 1_000_000n),
  },

  clock: {
    // Tip height is polled; the ledger reads the last value seen.
    pollIntervalMs: msEnv("CLOCK_POLL_INTERVAL_MS", 30_000),
  },

  confirmation: {
    // Custody transfers count only once their transaction executes.
    pollIntervalMs: msEnv("CONFIRMATION_POLL_INTERVAL_MS", 10_000),
    timeoutMs: msEnv("CONFIRMATION_TIMEOUT_MS", 1_800_000),
  },

  server: {
    port: portEnv("PORT", 8080),
    // Signed requests older than this are refused.
    signatureMaxAgeMs: msEnv("SIGNATURE_MAX_AGE_MS", 300_000),
  },

  journal: {
    dir: process.env.JOURNAL_DIR ?? "journal",
  },

  logLevel: process.env.LOG_LEVEL ?? "info",

  // Default fee per transaction in microSTX.
  feeMicroStx: 2000,
} as const;
