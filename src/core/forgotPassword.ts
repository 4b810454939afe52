import type { MessageResult } from "../types/auth";
import { ValidationError } from "../utils/errors";
import { clearResetToken, expiryFrom, requireEmail, requireField, withResetToken } from "./account";
import { deliver, type AuthContext } from "./context";

export const PASSWORD_RESET_MESSAGES = {
  requested: "If an account exists for that email, a password reset link has been sent",
  sendFailed: "Failed to send reset email",
  invalidToken: "Invalid or expired reset token",
  reset: "Password reset successfully",
} as const;

const RESET_TOKEN_LENGTH = 32;

/**
 * Start a password reset. Unknown emails get the same answer as known ones and
 * nothing is written for them.
 */
export async function requestPasswordResetCore(ctx: AuthContext, email: string): Promise<MessageResult> {
  const normalizedEmail = requireEmail(email);

  const account = await ctx.store.findByEmail(normalizedEmail);
  if (!account) {
    ctx.logger.event({ category: "auth", action: "forgot-password", outcome: "unknown-email", email: normalizedEmail });
    return { message: PASSWORD_RESET_MESSAGES.requested, success: true };
  }

  const token = ctx.hasher.generateSecureToken(RESET_TOKEN_LENGTH);
  const expiresAt = expiryFrom(ctx.now(), ctx.ttl.passwordResetSeconds);
  const saved = await ctx.store.update(withResetToken(account, token, expiresAt));

  const sent = await deliver(ctx, "password-reset", saved.email, () =>
    ctx.notifier.sendPasswordReset(saved.email, saved.name, token)
  );
  if (!sent) {
    throw new ValidationError(PASSWORD_RESET_MESSAGES.sendFailed);
  }

  ctx.logger.event({ category: "auth", action: "forgot-password", outcome: "success", accountId: saved.id });
  return { message: PASSWORD_RESET_MESSAGES.requested, success: true };
}

export async function resetPasswordCore(ctx: AuthContext, token: string, newPassword: string): Promise<MessageResult> {
  requireField(token, "Token");
  requireField(newPassword, "New password");

  const account = await ctx.store.findByResetToken(token, ctx.now());
  if (!account) {
    ctx.logger.event({ category: "auth", action: "reset-password", outcome: "invalid-token" });
    throw new ValidationError(PASSWORD_RESET_MESSAGES.invalidToken);
  }

  const strength = ctx.hasher.checkStrength(newPassword);
  if (!strength.ok) {
    throw new ValidationError(strength.reason);
  }

  const passwordHash = await ctx.hasher.hash(newPassword);
  const saved = await ctx.store.update({ ...clearResetToken(account), passwordHash });

  await deliver(ctx, "password-changed", saved.email, () =>
    ctx.notifier.sendPasswordChanged(saved.email, saved.name)
  );
  ctx.logger.event({ category: "auth", action: "reset-password", outcome: "success", accountId: saved.id });

  return { message: PASSWORD_RESET_MESSAGES.reset, success: true };
}
