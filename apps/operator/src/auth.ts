/**
 * auth.ts
 *
 * Every state-changing request names the principal it acts for and carries a
 * Stacks message signature over the request. The principal is accepted only
 * when the public key hashes to it and the signature covers exactly this
 * action, principal and amount. Each signature is accepted once, and only
 * while it is fresh.
 *
 * Signed text (lines joined by "\n"):
 *
 *   blockstake
 *   <action>
 *   <principal>
 *   <amount, or "-">
 *   <issuedAt, ms since epoch>
 */

import { getAddressFromPublicKey, type TransactionVersion } from "@stacks/transactions";
import { verifyMessageSignatureRsv } from "@stacks/encryption";
import { z } from "zod";
import { fail, ok, type Result } from "@blockstake/ledger";
import { logger } from "./logger";

export type SignedAction = "stake" | "claim" | "unstake" | "withdraw" | "set-minimum-stake";

export const RequestAuth = z.object({
  publicKey: z.string().regex(/^(0[23][0-9a-fA-F]{64}|04[0-9a-fA-F]{128})$/, "must be a secp256k1 public key"),
  signature: z.string().regex(/^[0-9a-fA-F]{130}$/, "must be a 65-byte RSV signature"),
  issuedAt: z.number().int().nonnegative(),
});
export type RequestAuth = z.infer<typeof RequestAuth>;

export interface SignedRequest {
  action: SignedAction;
  principal: string;
  amount?: bigint;
}

export function signedMessage(request: SignedRequest, issuedAt: number): string {
  return [
    "blockstake",
    request.action,
    request.principal,
    request.amount === undefined ? "-" : request.amount.toString(),
    String(issuedAt),
  ].join("\n");
}

export interface AuthenticatorOptions {
  txVersion: TransactionVersion;
  maxAgeMs: number;
  now?: () => number;
}

export class RequestAuthenticator {
  // signature -> issuedAt, for signatures that are still fresh
  private readonly used = new Map<string, number>();
  private readonly now: () => number;

  constructor(private readonly options: AuthenticatorOptions) {
    this.now = options.now ?? Date.now;
  }

  /** The authenticated principal, or `Unauthorized`. */
  verify(request: SignedRequest, auth: RequestAuth | undefined): Result<string> {
    if (auth === undefined) {
      return fail("Unauthorized", "request is not signed");
    }

    const now = this.now();
    this.forgetExpired(now);
    if (Math.abs(now - auth.issuedAt) > this.options.maxAgeMs) {
      return fail("Unauthorized", "signature has expired");
    }

    const signer = getAddressFromPublicKey(auth.publicKey, this.options.txVersion);
    if (signer !== request.principal) {
      return fail("Unauthorized", `signer ${signer} may not act for ${request.principal}`);
    }

    const signature = auth.signature.toLowerCase();
    if (this.used.has(signature)) {
      return fail("Unauthorized", "signature was already used");
    }
    if (!this.signatureMatches(signedMessage(request, auth.issuedAt), signature, auth.publicKey)) {
      return fail("Unauthorized", "signature does not match the request");
    }

    this.used.set(signature, auth.issuedAt);
    return ok(signer);
  }

  private signatureMatches(message: string, signature: string, publicKey: string): boolean {
    try {
      return verifyMessageSignatureRsv({ message, signature, publicKey });
    } catch (err) {
      // malformed point or signature encoding
      logger.debug(`signature check failed: ${err instanceof Error ? err.message : String(err)}`);
      return false;
    }
  }

  private forgetExpired(now: number): void {
    for (const [signature, issuedAt] of this.used) {
      if (now - issuedAt > this.options.maxAgeMs) this.used.delete(signature);
    }
  }
}
