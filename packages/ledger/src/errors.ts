/**
 * errors.ts
 *
 * Caller-visible failures carry a kind and a numeric code. Codes are grouped
 * the way the custody contracts group theirs:
 *   1xx: access control
 *   2xx: stake ledger
 *   3xx: withdrawal pool / asset transfer
 *   4xx: execution
 */

export const ErrorCode = {
  Unauthorized:      100,
  InvalidAmount:     200,
  AlreadyStaked:     201,
  NoActiveStake:     202,
  NothingToClaim:    203,
  EmptyWithdrawPool: 300,
  TransferFailed:    301,
  ReentrantCall:     400,
} as const;

export type ErrorKind = keyof typeof ErrorCode;

export interface LedgerFailure {
  kind: ErrorKind;
  code: (typeof ErrorCode)[ErrorKind];
  message: string;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: LedgerFailure };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(kind: ErrorKind, message: string): Result<T> {
  return { ok: false, error: { kind, code: ErrorCode[kind], message } };
}

/**
 * Thrown for states the ledger can never legitimately reach (a clock behind
 * the stake start, a non-positive pool credit). Never returned as a Result.
 */
export class LedgerInvariantError extends Error {
  public readonly name: string = "LedgerInvariantError";

  constructor(message: string) {
    super(message);
  }
}
