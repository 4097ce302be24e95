import { describe, it, expect, vi, beforeEach } from "vitest";
import { principalCV, uintCV } from "@stacks/transactions";
import { ManualClock, MemoryEventLog, StakingEngine } from "@blockstake/ledger";
import { contractCall, waitForTx } from "../apps/operator/src/stacks";
import { StacksCustodyGateway } from "../apps/operator/src/gateway";
import { OWNER, WALLET_1 } from "./helpers";

vi.mock("../apps/operator/src/stacks", () => ({
  contractCall: vi.fn(),
  waitForTx: vi.fn(),
}));

const CUSTODY = `${OWNER}.stake-custody`;
const CONFIRMATION = { pollIntervalMs: 10, timeoutMs: 1_000 };

function custodyGateway() {
  return new StacksCustodyGateway(CUSTODY, CONFIRMATION);
}

describe("custody gateway", () => {
  beforeEach(() => {
    vi.mocked(contractCall).mockReset();
    vi.mocked(waitForTx).mockReset();
  });

  it("deposit escrows the amount from the account once the transaction succeeds", async () => {
    vi.mocked(contractCall).mockResolvedValueOnce("0xabc");
    vi.mocked(waitForTx).mockResolvedValueOnce({ status: "success" });

    const outcome = await custodyGateway().deposit(WALLET_1, 100n);

    expect(outcome).toEqual({ ok: true, reference: "0xabc" });
    expect(contractCall).toHaveBeenCalledWith(CUSTODY, "escrow", [uintCV(100n), principalCV(WALLET_1)]);
    expect(waitForTx).toHaveBeenCalledWith("0xabc", CONFIRMATION);
  });

  it("payout releases the amount to the account once the transaction succeeds", async () => {
    vi.mocked(contractCall).mockResolvedValueOnce("0xdef");
    vi.mocked(waitForTx).mockResolvedValueOnce({ status: "success" });

    const outcome = await custodyGateway().payout(WALLET_1, 102n);

    expect(outcome).toEqual({ ok: true, reference: "0xdef" });
    expect(contractCall).toHaveBeenCalledWith(CUSTODY, "release", [uintCV(102n), principalCV(WALLET_1)]);
  });

  it("reports a rejected broadcast as a failed transfer", async () => {
    vi.mocked(contractCall).mockRejectedValueOnce(new Error("Broadcast failed [stake-custody::release]: rejected"));

    const outcome = await custodyGateway().payout(WALLET_1, 102n);

    expect(outcome).toEqual({ ok: false, reason: "Broadcast failed [stake-custody::release]: rejected" });
    expect(waitForTx).not.toHaveBeenCalled();
  });

  it("reports an escrow that aborts on chain as a failed transfer", async () => {
    vi.mocked(contractCall).mockResolvedValueOnce("0xaborted");
    vi.mocked(waitForTx).mockResolvedValueOnce({
      status: "failed",
      reason: "transaction 0xaborted ended with abort_by_response",
    });

    const outcome = await custodyGateway().deposit(WALLET_1, 100n);

    expect(outcome).toEqual({ ok: false, reason: "transaction 0xaborted ended with abort_by_response" });
  });

  describe("behind the ledger", () => {
    function engineOverCustody() {
      const log = new MemoryEventLog();
      const engine = new StakingEngine({
        owner: OWNER,
        payoutGap: 10n,
        minimumStake: 50n,
        gateway: custodyGateway(),
        clock: new ManualClock(0n),
        eventLog: log,
      });
      return { engine, log };
    }

    it("leaves the account inactive when the escrow aborts", async () => {
      const { engine, log } = engineOverCustody();
      vi.mocked(contractCall).mockResolvedValueOnce("0xescrow");
      vi.mocked(waitForTx).mockResolvedValueOnce({
        status: "failed",
        reason: "transaction 0xescrow ended with abort_by_post_condition",
      });

      const result = await engine.stake(WALLET_1, 100n);

      expect(result).toEqual({
        ok: false,
        error: {
          kind: "TransferFailed",
          code: 301,
          message: "deposit failed: transaction 0xescrow ended with abort_by_post_condition",
        },
      });
      expect(engine.getStake(WALLET_1).active).toBe(false);
      expect(log.events).toEqual([]);
    });

    it("keeps the pending balance when the release aborts", async () => {
      const { engine, log } = engineOverCustody();
      vi.mocked(contractCall).mockResolvedValue("0xtx");
      vi.mocked(waitForTx)
        .mockResolvedValueOnce({ status: "success" })
        .mockResolvedValueOnce({ status: "failed", reason: "transaction 0xtx ended with abort_by_response" });
      await engine.stake(WALLET_1, 100n);
      engine.unstake(WALLET_1);

      const result = await engine.withdraw(WALLET_1);

      expect(result).toEqual({
        ok: false,
        error: {
          kind: "TransferFailed",
          code: 301,
          message: "payout failed: transaction 0xtx ended with abort_by_response",
        },
      });
      expect(engine.pendingWithdrawal(WALLET_1)).toBe(100n);
      expect(log.events.map((e) => e.type)).toEqual(["Stake", "Unstake"]);
    });
  });
});
