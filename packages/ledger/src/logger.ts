/** The subset of a leveled logger the ledger writes to. */
export interface LedgerLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
}

export const silentLogger: LedgerLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};
