import type { MessageResult, VerifyResult } from "../types/auth";
import { ValidationError } from "../utils/errors";
import { clearVerificationToken, expiryFrom, requireEmail, requireField, withVerificationToken } from "./account";
import { deliver, type AuthContext } from "./context";
import { issueSession } from "./signin";

export const VERIFICATION_MESSAGES = {
  verified: "Email verified successfully. You are now signed in.",
  invalidToken: "Invalid or expired verification token",
  resent: "Verification email sent successfully",
  notFound: "User not found",
  alreadyVerified: "Email already verified",
  sendFailed: "Failed to send verification email",
} as const;

const VERIFICATION_TOKEN_LENGTH = 32;

/**
 * Consume a verification token. The store only matches unexpired tokens, so an
 * expired token and an unknown one fail the same way. Success signs the user in.
 */
export async function verifyEmailCore(ctx: AuthContext, token: string): Promise<VerifyResult> {
  requireField(token, "Token");
  const now = ctx.now();

  const account = await ctx.store.findByVerificationToken(token, now);
  if (!account) {
    ctx.logger.event({ category: "auth", action: "verify-email", outcome: "invalid-token" });
    throw new ValidationError(VERIFICATION_MESSAGES.invalidToken);
  }

  const saved = await ctx.store.update({
    ...clearVerificationToken(account),
    isVerified: true,
    lastLoginAt: now,
  });

  await deliver(ctx, "welcome", saved.email, () => ctx.notifier.sendWelcome(saved.email, saved.name));
  ctx.logger.event({ category: "auth", action: "verify-email", outcome: "success", accountId: saved.id });

  return { ...issueSession(ctx, saved, VERIFICATION_MESSAGES.verified), isVerified: true };
}

export async function resendVerificationCore(ctx: AuthContext, email: string): Promise<MessageResult> {
  const normalizedEmail = requireEmail(email);

  const account = await ctx.store.findByEmail(normalizedEmail);
  if (!account) {
    throw new ValidationError(VERIFICATION_MESSAGES.notFound);
  }
  if (account.isVerified) {
    throw new ValidationError(VERIFICATION_MESSAGES.alreadyVerified);
  }

  const token = ctx.hasher.generateSecureToken(VERIFICATION_TOKEN_LENGTH);
  const expiresAt = expiryFrom(ctx.now(), ctx.ttl.emailVerificationSeconds);
  const saved = await ctx.store.update(withVerificationToken(account, token, expiresAt));

  const sent = await deliver(ctx, "verification", saved.email, () =>
    ctx.notifier.sendVerification(saved.email, saved.name, token)
  );
  if (!sent) {
    throw new ValidationError(VERIFICATION_MESSAGES.sendFailed);
  }

  return { message: VERIFICATION_MESSAGES.resent, success: true };
}
