/**
 * clock.ts
 *
 * Block clock that follows the Stacks chain tip. The tip is polled on a
 * timer; the ledger reads whatever height was seen last. A lower height
 * (a node behind the one polled before) is ignored so the clock never
 * moves backwards.
 */

import type { BlockClock } from "@blockstake/ledger";
import { fetchTipHeight } from "./stacks";
import { logger } from "./logger";

export class ChainClock implements BlockClock {
  private height = 0n;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly readTip: () => Promise<bigint> = () => fetchTipHeight()
  ) {}

  currentBlock(): bigint {
    return this.height;
  }

  /** Poll the tip once. Returns the height the clock now holds. */
  async sync(): Promise<bigint> {
    const tip = await this.readTip();
    if (tip < this.height) {
      logger.warn(`Tip ${tip} is behind last seen height ${this.height}; keeping ${this.height}.`);
    } else if (tip > this.height) {
      logger.debug(`Tip advanced ${this.height} → ${tip}`);
      this.height = tip;
    }
    return this.height;
  }

  start(intervalMs: number): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.sync().catch((err) => logger.error(`Tip poll failed: ${err}`));
    }, intervalMs);
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
  }
}
