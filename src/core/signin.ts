import type { Account } from "../types/account";
import type { AuthResult } from "../types/auth";
import { AuthenticationError } from "../utils/errors";
import { requireEmail, requireField, toAccountSummary } from "./account";
import type { AuthContext } from "./context";

export const SIGNIN_MESSAGES = {
  success: "Sign in successful",
  invalidCredentials: "Invalid email or password",
  disabled: "Account is disabled",
  unverified: "Please verify your email before signing in",
} as const;

/**
 * Email + password check shared by signin and Basic request authentication.
 * An unknown email and a wrong password fail identically.
 */
export async function verifyCredentials(ctx: AuthContext, email: string, password: string): Promise<Account> {
  const normalizedEmail = requireEmail(email);
  requireField(password, "Password");

  const account = await ctx.store.findByEmail(normalizedEmail);
  if (!account) {
    await ctx.hasher.dummyVerify(password);
    ctx.logger.event({ category: "auth", action: "credentials", outcome: "invalid-credentials", email: normalizedEmail });
    throw new AuthenticationError(SIGNIN_MESSAGES.invalidCredentials);
  }

  const valid = await ctx.hasher.verify(password, account.passwordHash);
  if (!valid) {
    ctx.logger.event({ category: "auth", action: "credentials", outcome: "invalid-credentials", email: normalizedEmail });
    throw new AuthenticationError(SIGNIN_MESSAGES.invalidCredentials);
  }

  return account;
}

export function issueSession(ctx: AuthContext, account: Account, message: string): AuthResult {
  return {
    message,
    user: toAccountSummary(account),
    accessToken: ctx.tokens.issueAccess(account.id, account.email, account.name),
    refreshToken: ctx.tokens.issueRefresh(account.id, account.email, account.name),
    tokenType: "bearer",
    expiresIn: ctx.tokens.accessTtlSeconds,
  };
}

export async function signinCore(ctx: AuthContext, email: string, password: string): Promise<AuthResult> {
  const account = await verifyCredentials(ctx, email, password);

  if (!account.isActive) {
    ctx.logger.event({ category: "auth", action: "signin", outcome: "disabled", accountId: account.id });
    throw new AuthenticationError(SIGNIN_MESSAGES.disabled);
  }

  if (!account.isVerified) {
    ctx.logger.event({ category: "auth", action: "signin", outcome: "unverified", accountId: account.id });
    throw new AuthenticationError(SIGNIN_MESSAGES.unverified);
  }

  const saved = await ctx.store.update({ ...account, lastLoginAt: ctx.now() });
  ctx.logger.event({ category: "auth", action: "signin", outcome: "success", accountId: saved.id });
  return issueSession(ctx, saved, SIGNIN_MESSAGES.success);
}
