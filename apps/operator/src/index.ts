/**
 * blockstake operator
 *
 * Hosts the staking ledger:
 *   - follows the Stacks chain tip as the ledger's block clock
 *   - moves the staked asset through the custody contract
 *   - journals every ledger event for auditing
 *   - serves the staking HTTP API
 *
 * Usage:
 *   npm start
 *
 * Environment variables (see .env.example):
 *   STACKS_NETWORK, STACKS_API_URL, CUSTODY_PRIVATE_KEY, CUSTODY_CONTRACT_ADDRESS,
 *   LEDGER_OWNER, PAYOUT_GAP, MINIMUM_STAKE, CLOCK_POLL_INTERVAL_MS,
 *   CONFIRMATION_POLL_INTERVAL_MS, CONFIRMATION_TIMEOUT_MS, SIGNATURE_MAX_AGE_MS,
 *   PORT, JOURNAL_DIR, LOG_LEVEL
 */

import { config } from "./config";
import { logger } from "./logger";
import { Operator } from "./operator";

async function main() {
  logger.info("blockstake operator v0.1.0");
  logger.info(`Network: ${config.network} | API: ${config.apiUrl}`);

  if (!config.ledger.owner) {
    logger.error("LEDGER_OWNER is not set. Exiting.");
    process.exit(1);
  }
  if (config.contracts.custody && !config.custodyPrivateKey) {
    logger.error("CUSTODY_PRIVATE_KEY is required with CUSTODY_CONTRACT_ADDRESS. Exiting.");
    process.exit(1);
  }

  const operator = new Operator();
  await operator.start();

  // Graceful shutdown on SIGINT / SIGTERM
  const shutdown = () => {
    operator
      .stop()
      .then(() => process.exit(0))
      .catch((err) => {
        logger.error(`Shutdown failed: ${err}`);
        process.exit(1);
      });
  };
  process.on("SIGINT",  shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err) => {
  logger.error(`Fatal: ${err}`);
  process.exit(1);
});
