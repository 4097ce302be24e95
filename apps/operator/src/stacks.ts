/**
 * stacks.ts
 *
 * Low-level helpers for building, signing, and broadcasting Stacks
 * contract-call transactions from the custody wallet, following them until
 * they execute, and reading the chain tip.
 *
 * Uses @stacks/transactions v6 API (makeContractCall, broadcastTransaction…)
 * and the Stacks API client for transaction status.
 */

import {
  makeContractCall,
  broadcastTransaction,
  AnchorMode,
  PostConditionMode,
  type ClarityValue,
  getAddressFromPrivateKey,
  TransactionVersion,
  validateStacksAddress,
} from "@stacks/transactions";
import { StacksMainnet, StacksTestnet, StacksDevnet } from "@stacks/network";
import { Configuration, TransactionsApi } from "@stacks/blockchain-api-client";
import { z } from "zod";
import { config } from "./config";
import { logger } from "./logger";

// -----------------------------------------------------------------------
// Network
// -----------------------------------------------------------------------

function getNetwork() {
  switch (config.network) {
    case "mainnet":
      return new StacksMainnet({ url: config.apiUrl });
    case "testnet":
      return new StacksTestnet({ url: config.apiUrl });
    default:
      return new StacksDevnet({ url: config.apiUrl });
  }
}

export function getTxVersion(): TransactionVersion {
  return config.network === "mainnet"
    ? TransactionVersion.Mainnet
    : TransactionVersion.Testnet;
}

/** Stacks address derived from the custody private key. */
export function getCustodyAddress(): string {
  return getAddressFromPrivateKey(config.custodyPrivateKey, getTxVersion());
}

// -----------------------------------------------------------------------
// Principals
// -----------------------------------------------------------------------

/** Split "ST1ABC…XYZ.contract-name" into [contractAddress, contractName]. */
export function parseContractId(id: string): [string, string] {
  const dot = id.lastIndexOf(".");
  if (dot < 0) throw new Error(`Invalid contract id: "${id}"`);
  return [id.slice(0, dot), id.slice(dot + 1)];
}

/** Standard ("ST…") or contract ("ST….name") principal. */
export function isStacksPrincipal(id: string): boolean {
  const dot = id.indexOf(".");
  if (dot < 0) return validateStacksAddress(id);
  const name = id.slice(dot + 1);
  return validateStacksAddress(id.slice(0, dot)) && /^[a-zA-Z][a-zA-Z0-9-]{0,39}$/.test(name);
}

// -----------------------------------------------------------------------
// Public API
// -----------------------------------------------------------------------

/**
 * Build, sign, and broadcast a contract-call transaction.
 * Returns the txid once the node accepts it; that is not execution, see
 * waitForTx. Throws on broadcast failure.
 */
export async function contractCall(
  contractId: string,
  functionName: string,
  functionArgs: ClarityValue[]
): Promise<string> {
  const [contractAddress, contractName] = parseContractId(contractId);
  const network = getNetwork();

  const tx = await makeContractCall({
    network,
    contractAddress,
    contractName,
    functionName,
    functionArgs,
    senderKey: config.custodyPrivateKey,
    anchorMode: AnchorMode.Any,
    postConditionMode: PostConditionMode.Allow,
    fee: config.feeMicroStx,
  });

  const result = await broadcastTransaction(tx, network);

  if ("error" in result && result.error) {
    throw new Error(`Broadcast failed [${contractName}::${functionName}]: ${result.error} (${result.reason})`);
  }

  logger.info(`${contractName}::${functionName} → txid ${result.txid}`);
  return result.txid;
}

// -----------------------------------------------------------------------
// Confirmation
// -----------------------------------------------------------------------

export type TxOutcome =
  | { status: "success" }
  | { status: "failed"; reason: string };

/** Reads a transaction's `tx_status` ("pending", "success", "abort_by_response", …). */
export type TxStatusReader = (txid: string) => Promise<string>;

export interface WaitOptions {
  pollIntervalMs: number;
  timeoutMs: number;
  readStatus?: TxStatusReader;
}

const TxStatusSchema = z.object({ tx_status: z.string() });

export function apiTxStatusReader(apiUrl: string = config.apiUrl): TxStatusReader {
  const api = new TransactionsApi(new Configuration({ basePath: apiUrl }));
  return async (txid) => TxStatusSchema.parse(await api.getTransactionById({ txId: txid })).tx_status;
}

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Poll a broadcast transaction until it leaves the mempool. Only "success"
 * counts as executed; an abort, a drop or running out of time is a failure.
 * A lookup error (the API not having indexed the txid yet) reads as pending.
 */
export async function waitForTx(txid: string, options: WaitOptions): Promise<TxOutcome> {
  const readStatus = options.readStatus ?? apiTxStatusReader();
  const deadline = Date.now() + options.timeoutMs;

  for (;;) {
    let status = "pending";
    try {
      status = await readStatus(txid);
    } catch (err) {
      logger.debug(`status of ${txid} unavailable: ${err instanceof Error ? err.message : String(err)}`);
    }

    if (status === "success") return { status: "success" };
    if (status !== "pending") {
      return { status: "failed", reason: `transaction ${txid} ended with ${status}` };
    }
    if (Date.now() >= deadline) {
      return { status: "failed", reason: `transaction ${txid} not confirmed within ${options.timeoutMs}ms` };
    }
    await sleep(options.pollIntervalMs);
  }
}

// -----------------------------------------------------------------------
// Chain tip
// -----------------------------------------------------------------------

const CoreInfoSchema = z.object({
  stacks_tip_height: z.number().int().nonnegative(),
});

/** Current Stacks tip height from the node's /v2/info endpoint. */
export async function fetchTipHeight(apiUrl: string = config.apiUrl): Promise<bigint> {
  const resp = await fetch(`${apiUrl}/v2/info`);
  if (!resp.ok) {
    throw new Error(`GET ${apiUrl}/v2/info returned ${resp.status}`);
  }
  const info = CoreInfoSchema.parse(await resp.json());
  return BigInt(info.stacks_tip_height);
}
