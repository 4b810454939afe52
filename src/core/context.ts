import { randomUUID } from "crypto";
import type { ServiceConfig } from "../types/config";
import type { AccountStore } from "../types/db";
import type { Notifier } from "../types/email";
import { TokenIssuer } from "../tokens/tokenIssuer";
import { CredentialHasher } from "../utils/hash";
import { createLogger, describeError, type AuthLogger } from "../utils/logger";

/**
 * Everything an auth operation needs. Built once at startup and shared; the
 * store is the only collaborator holding mutable state.
 */
export interface AuthContext {
  store: AccountStore;
  notifier: Notifier;
  hasher: CredentialHasher;
  tokens: TokenIssuer;
  logger: AuthLogger;
  /** Lifetimes of the stored single-use tokens, in seconds. */
  ttl: {
    emailVerificationSeconds: number;
    passwordResetSeconds: number;
  };
  now: () => Date;
  newId: () => string;
}

export interface AuthContextDeps {
  store: AccountStore;
  notifier: Notifier;
  now?: () => Date;
  newId?: () => string;
}

export function createAuthContext(config: ServiceConfig, deps: AuthContextDeps): AuthContext {
  const now = deps.now ?? (() => new Date());
  return {
    store: deps.store,
    notifier: deps.notifier,
    hasher: new CredentialHasher({ rounds: config.passwords.bcryptRounds }),
    tokens: new TokenIssuer({ jwt: config.jwt, ttl: config.tokenTtl, now }),
    logger: createLogger("auth"),
    ttl: {
      emailVerificationSeconds: config.tokenTtl.emailVerificationSeconds,
      passwordResetSeconds: config.tokenTtl.passwordResetSeconds,
    },
    now,
    newId: deps.newId ?? randomUUID,
  };
}

/**
 * Run a notifier call and report whether it went through. A rejection is
 * logged and counted as a failed delivery, same as a `false` result.
 */
export async function deliver(
  ctx: AuthContext,
  kind: string,
  email: string,
  send: () => Promise<boolean>
): Promise<boolean> {
  let delivered = false;
  let error: string | undefined;
  try {
    delivered = await send();
  } catch (err) {
    error = describeError(err);
  }
  ctx.logger.event({
    category: "email",
    action: kind,
    outcome: delivered ? "success" : "failed",
    email,
    error,
  });
  return delivered;
}
