/**
 * gateway.ts
 *
 * TokenGateway backed by the on-chain custody contract. The contract keeps
 * the asset in escrow and exposes two operator-only functions:
 *
 *   (escrow  (amount uint) (from principal))       : pull `amount` from `from`
 *   (release (amount uint) (recipient principal))  : send `amount` to `recipient`
 *
 * A transfer succeeds only when its transaction executes with status
 * "success". A rejected broadcast, an aborted or dropped transaction, or one
 * still unconfirmed at the timeout is a failed transfer; the ledger then rolls
 * back the operation that asked for it.
 */

import { principalCV, uintCV } from "@stacks/transactions";
import type { TokenGateway, TransferOutcome } from "@blockstake/ledger";
import { contractCall, waitForTx, type WaitOptions } from "./stacks";
import { logger } from "./logger";

export class StacksCustodyGateway implements TokenGateway {
  constructor(
    private readonly custodyContract: string,
    private readonly confirmation: WaitOptions
  ) {}

  async deposit(from: string, amount: bigint): Promise<TransferOutcome> {
    return this.call("escrow", from, amount);
  }

  async payout(to: string, amount: bigint): Promise<TransferOutcome> {
    return this.call("release", to, amount);
  }

  private async call(functionName: "escrow" | "release", account: string, amount: bigint): Promise<TransferOutcome> {
    let txid: string;
    try {
      txid = await contractCall(
        this.custodyContract,
        functionName,
        [uintCV(amount), principalCV(account)]
      );
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      logger.error(`custody ${functionName} for ${account} (${amount}) failed: ${reason}`);
      return { ok: false, reason };
    }

    const outcome = await waitForTx(txid, this.confirmation);
    if (outcome.status === "failed") {
      logger.error(`custody ${functionName} for ${account} (${amount}) did not execute: ${outcome.reason}`);
      return { ok: false, reason: outcome.reason };
    }
    return { ok: true, reference: txid };
  }
}
