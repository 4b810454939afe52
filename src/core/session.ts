import type { Account } from "../types/account";
import type { AuthResult } from "../types/auth";
import { AuthenticationError } from "../utils/errors";
import { requireField, toAccountSummary } from "./account";
import type { AuthContext } from "./context";

export const SESSION_MESSAGES = {
  refreshed: "Token refreshed successfully",
  invalidRefresh: "Invalid refresh token",
  inactive: "User not found or inactive",
} as const;

/**
 * Trade a refresh token for a new access token. The refresh token stays valid
 * until it expires.
 */
export async function refreshTokenCore(ctx: AuthContext, refreshToken: string): Promise<AuthResult> {
  requireField(refreshToken, "Refresh token");

  const claims = ctx.tokens.verifyPurpose(refreshToken, "refresh");
  if (!claims) {
    ctx.logger.event({ category: "auth", action: "refresh", outcome: "invalid-token" });
    throw new AuthenticationError(SESSION_MESSAGES.invalidRefresh);
  }

  const account = await ctx.store.findById(claims.sub);
  if (!account || !account.isActive) {
    ctx.logger.event({ category: "auth", action: "refresh", outcome: "inactive", accountId: claims.sub });
    throw new AuthenticationError(SESSION_MESSAGES.inactive);
  }

  return {
    message: SESSION_MESSAGES.refreshed,
    user: toAccountSummary(account),
    accessToken: ctx.tokens.issueAccess(account.id, account.email, account.name),
    tokenType: "bearer",
    expiresIn: ctx.tokens.accessTtlSeconds,
  };
}

/** Account behind an access token, or null. Active and verified flags are left to the caller. */
export async function resolveCurrentUser(ctx: AuthContext, accessToken: string): Promise<Account | null> {
  const claims = ctx.tokens.verifyPurpose(accessToken, "access");
  if (!claims) return null;
  return ctx.store.findById(claims.sub);
}
