/**
 * server.ts
 *
 * HTTP surface of the operator. Amounts travel as decimal strings in both
 * directions; accounts must be Stacks principals. Reads are open; every
 * state-changing route needs a request signature from the principal it
 * names (see auth.ts).
 */

import express, { Router, type NextFunction, type Request, type Response } from "express";
import { z } from "zod";
import type { ErrorKind, Result, StakingEngine } from "@blockstake/ledger";
import { RequestAuth, RequestAuthenticator, type AuthenticatorOptions, type SignedRequest } from "./auth";
import { config } from "./config";
import { getTxVersion, isStacksPrincipal } from "./stacks";
import { logger } from "./logger";

const Account = z.string().refine(isStacksPrincipal, "must be a Stacks principal");
const Amount = z
  .string()
  .regex(/^\d+$/, "must be a non-negative decimal string")
  .transform((raw) => BigInt(raw));

const AccountParams = z.object({ account: Account });
const StakeBody = z.object({ account: Account, amount: Amount, auth: RequestAuth.optional() });
const AccountBody = z.object({ account: Account, auth: RequestAuth.optional() });
const MinimumStakeBody = z.object({ caller: Account, amount: Amount, auth: RequestAuth.optional() });

const HTTP_STATUS: Record<ErrorKind, number> = {
  Unauthorized:      403,
  InvalidAmount:     400,
  AlreadyStaked:     409,
  NoActiveStake:     409,
  NothingToClaim:    409,
  EmptyWithdrawPool: 409,
  ReentrantCall:     409,
  TransferFailed:    502,
};

type Handler = (req: Request, res: Response) => Promise<void> | void;

/** Forward rejected promises to the error middleware. */
const asyncHandler = (fn: Handler) => (req: Request, res: Response, next: NextFunction) => {
  Promise.resolve(fn(req, res)).catch(next);
};

function parse<S extends z.ZodTypeAny>(schema: S, input: unknown, res: Response): z.infer<S> | null {
  const parsed = schema.safeParse(input);
  if (parsed.success) return parsed.data;
  const message = parsed.error.issues
    .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
    .join("; ");
  res.status(400).json({ ok: false, error: { kind: "BadRequest", message } });
  return null;
}

function reply<T>(res: Response, result: Result<T>): void {
  if (result.ok) {
    res.json({ ok: true, value: result.value });
    return;
  }
  res.status(HTTP_STATUS[result.error.kind]).json({ ok: false, error: result.error });
}

export function stakingRouter(engine: StakingEngine, authenticator: RequestAuthenticator): Router {
  const r = Router();

  /** Writes the 403 and returns false when the request is not signed by its principal. */
  const authorized = (res: Response, request: SignedRequest, auth: RequestAuth | undefined): boolean => {
    const verified = authenticator.verify(request, auth);
    if (verified.ok) return true;
    logger.warn(`refused ${request.action} for ${request.principal}: ${verified.error.message}`);
    reply(res, verified);
    return false;
  };

  r.get("/status", (_req, res) => {
    res.json({
      ok: true,
      value: {
        blockHeight: engine.currentBlock(),
        settings: engine.settingsView(),
        totals: engine.totals(),
      },
    });
  });

  r.get("/accounts/:account", (req, res) => {
    const params = parse(AccountParams, req.params, res);
    if (params === null) return;
    res.json({ ok: true, value: engine.position(params.account) });
  });

  r.post("/stake", asyncHandler(async (req, res) => {
    const body = parse(StakeBody, req.body, res);
    if (body === null) return;
    if (!authorized(res, { action: "stake", principal: body.account, amount: body.amount }, body.auth)) return;
    reply(res, await engine.stake(body.account, body.amount));
  }));

  r.post("/claim", (req, res) => {
    const body = parse(AccountBody, req.body, res);
    if (body === null) return;
    if (!authorized(res, { action: "claim", principal: body.account }, body.auth)) return;
    reply(res, engine.claim(body.account));
  });

  r.post("/unstake", (req, res) => {
    const body = parse(AccountBody, req.body, res);
    if (body === null) return;
    if (!authorized(res, { action: "unstake", principal: body.account }, body.auth)) return;
    reply(res, engine.unstake(body.account));
  });

  r.post("/withdraw", asyncHandler(async (req, res) => {
    const body = parse(AccountBody, req.body, res);
    if (body === null) return;
    if (!authorized(res, { action: "withdraw", principal: body.account }, body.auth)) return;
    reply(res, await engine.withdraw(body.account));
  }));

  r.put("/admin/minimum-stake", (req, res) => {
    const body = parse(MinimumStakeBody, req.body, res);
    if (body === null) return;
    const request: SignedRequest = { action: "set-minimum-stake", principal: body.caller, amount: body.amount };
    if (!authorized(res, request, body.auth)) return;
    reply(res, engine.setMinimumStake(body.caller, body.amount));
  });

  return r;
}

export function createApp(
  engine: StakingEngine,
  auth: AuthenticatorOptions = { txVersion: getTxVersion(), maxAgeMs: config.server.signatureMaxAgeMs }
): express.Express {
  const app = express();
  app.set("json replacer", (_key: string, value: unknown) =>
    typeof value === "bigint" ? value.toString() : value
  );
  app.use(express.json());
  app.use(stakingRouter(engine, new RequestAuthenticator(auth)));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    // express.json() reports unparseable bodies as SyntaxError
    if (err instanceof SyntaxError) {
      res.status(400).json({ ok: false, error: { kind: "BadRequest", message: "body is not valid JSON" } });
      return;
    }
    logger.error(err instanceof Error ? err.stack ?? err.message : String(err));
    res.status(500).json({ ok: false, error: { kind: "Internal", message: "internal error" } });
  });

  return app;
}
