/**
 * journal.ts
 *
 * Audit journal: every ledger event becomes one JSON line in a daily rotated
 * file. Amounts and heights are written as decimal strings.
 *
 * The journal is also the ledger's durable state: on startup the operator
 * reads it back and replays it into a fresh engine, so rotated files are
 * kept uncompressed and never pruned.
 */

import { readFile, readdir } from "node:fs/promises";
import path from "node:path";
import winston from "winston";
import { z } from "zod";
import DailyRotateFile from "winston-daily-rotate-file";
import type { LedgerEvent } from "@blockstake/types";
import type { EventLog } from "@blockstake/ledger";

/** JSON-safe form of an event: bigint fields become decimal strings. */
export function serializeEvent(event: LedgerEvent): Record<string, string | number> {
  const out: Record<string, string | number> = {};
  for (const [key, value] of Object.entries(event)) {
    out[key] = typeof value === "bigint" ? value.toString() : value;
  }
  return out;
}

export class JournalEventLog implements EventLog {
  private readonly journal: winston.Logger;

  constructor(transports: winston.LoggerOptions["transports"]) {
    this.journal = winston.createLogger({
      level: "info",
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json()
      ),
      transports,
    });
  }

  /** Journal writing to `<dir>/ledger-events-YYYY-MM-DD.log`. */
  static rotating(dir: string): JournalEventLog {
    return new JournalEventLog(
      new DailyRotateFile({
        filename: path.join(dir, "ledger-events-%DATE%.log"),
        datePattern: "YYYY-MM-DD",
      })
    );
  }

  append(event: LedgerEvent): void {
    this.journal.info(event.type, serializeEvent(event));
  }

  close(): void {
    this.journal.close();
  }
}

// -----------------------------------------------------------------------
// Reading back
// -----------------------------------------------------------------------

const JOURNAL_FILE = /^ledger-events-\d{4}-\d{2}-\d{2}\.log$/;

const Uint = z.string().regex(/^\d+$/).transform((raw) => BigInt(raw));
const Stamp = { sequence: z.number().int().positive(), blockHeight: Uint };

// Winston's own fields (level, message, timestamp) are stripped.
const JournalLine = z.discriminatedUnion("type", [
  z.object({ type: z.literal("Stake"), account: z.string(), amount: Uint, ...Stamp }),
  z.object({ type: z.literal("Claim"), account: z.string(), amount: Uint, ...Stamp }),
  z.object({ type: z.literal("Unstake"), account: z.string(), amount: Uint, ...Stamp }),
  z.object({ type: z.literal("Withdraw"), account: z.string(), amount: Uint, ...Stamp }),
  z.object({ type: z.literal("MinimumStakeChanged"), previous: Uint, next: Uint, ...Stamp }),
]);

export function parseJournalLine(line: string): LedgerEvent {
  return JournalLine.parse(JSON.parse(line));
}

/**
 * Every event journaled under `dir`, in sequence order. A missing directory
 * is an empty journal; a line that does not parse is an error.
 */
export async function readJournal(dir: string): Promise<LedgerEvent[]> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
    throw err;
  }

  const events: LedgerEvent[] = [];
  for (const name of names.filter((n) => JOURNAL_FILE.test(n)).sort()) {
    const text = await readFile(path.join(dir, name), "utf8");
    text.split("\n").forEach((line, index) => {
      if (line.trim() === "") return;
      try {
        events.push(parseJournalLine(line));
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        throw new Error(`${name}:${index + 1}: unreadable journal entry: ${reason}`);
      }
    });
  }
  return events.sort((a, b) => a.sequence - b.sequence);
}
