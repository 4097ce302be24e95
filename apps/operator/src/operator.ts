/**
 * operator.ts
 *
 * Wires the ledger to the outside world and owns the process lifecycle:
 *
 *  1. Clock: follows the Stacks chain tip (polled).
 *  2. Custody: the custody contract when CUSTODY_CONTRACT_ADDRESS is set,
 *            otherwise in-process custody (devnet only).
 *  3. Journal: ledger events appended to daily rotated JSON-lines files, and
 *             replayed into the engine on start.
 *  4. HTTP: the staking API.
 */

import type { Server } from "node:http";
import { MemoryTokenGateway, StakingEngine, type TokenGateway } from "@blockstake/ledger";
import { config } from "./config";
import { ChainClock } from "./clock";
import { StacksCustodyGateway } from "./gateway";
import { JournalEventLog, readJournal } from "./journal";
import { createApp } from "./server";
import { getCustodyAddress } from "./stacks";
import { logger } from "./logger";

export class Operator {
  readonly clock = new ChainClock();
  readonly journal = JournalEventLog.rotating(config.journal.dir);
  readonly engine: StakingEngine;

  private server: Server | null = null;

  constructor() {
    this.engine = new StakingEngine({
      owner: config.ledger.owner,
      payoutGap: config.ledger.payoutGap,
      minimumStake: config.ledger.minimumStake,
      gateway: this.createGateway(),
      clock: this.clock,
      eventLog: this.journal,
      logger,
    });
  }

  // -----------------------------------------------------------------------
  // Lifecycle
  // -----------------------------------------------------------------------

  async start(): Promise<void> {
    const restored = this.engine.restore(await readJournal(config.journal.dir));
    const totals = this.engine.totals();
    logger.info(
      `Restored ${restored} journaled events: ${totals.activeStakers} active stakes, ` +
        `${totals.totalStaked} staked, ${totals.outstanding} awaiting withdrawal`
    );

    const height = await this.clock.sync();
    logger.info(`Chain tip: ${height}. Polling every ${config.clock.pollIntervalMs / 1000}s`);
    this.clock.start(config.clock.pollIntervalMs);

    const app = createApp(this.engine);
    await new Promise<void>((resolve) => {
      this.server = app.listen(config.server.port, () => resolve());
    });
    logger.info(`Staking API listening on :${config.server.port}`);
  }

  async stop(): Promise<void> {
    this.clock.stop();
    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
      });
    }
    this.journal.close();
    logger.info("Operator stopped.");
  }

  private createGateway(): TokenGateway {
    if (config.contracts.custody) {
      logger.info(`Custody contract: ${config.contracts.custody} (operator ${getCustodyAddress()})`);
      return new StacksCustodyGateway(config.contracts.custody, config.confirmation);
    }
    if (config.network !== "devnet") {
      throw new Error(`CUSTODY_CONTRACT_ADDRESS is required on ${config.network}`);
    }
    logger.warn("No custody contract configured; using in-process custody.");
    return new MemoryTokenGateway();
  }
}
