import * as jwt from "jsonwebtoken";
import type { JwtConfig } from "../types/config";

export const TOKEN_PURPOSES = ["access", "refresh", "email_verification", "password_reset"] as const;

export type TokenPurpose = (typeof TOKEN_PURPOSES)[number];
export type IdentityPurpose = "access" | "refresh";
export type EmailPurpose = "email_verification" | "password_reset";

interface BaseClaims {
  iat: number;
  exp: number;
  jti?: string;
}

/** Access and refresh tokens identify an account. */
export interface IdentityClaims extends BaseClaims {
  type: IdentityPurpose;
  sub: string;
  email: string;
  name: string;
}

/** Verification and reset tokens carry only the address they were issued for. */
export interface EmailClaims extends BaseClaims {
  type: EmailPurpose;
  email: string;
}

export type TokenClaims = IdentityClaims | EmailClaims;

interface ClaimsByPurpose {
  access: IdentityClaims & { type: "access" };
  refresh: IdentityClaims & { type: "refresh" };
  email_verification: EmailClaims & { type: "email_verification" };
  password_reset: EmailClaims & { type: "password_reset" };
}

export type ClaimsFor<P extends TokenPurpose> = ClaimsByPurpose[P];

export type VerifyOutcome =
  | { valid: true; claims: TokenClaims }
  | { valid: false; reason: "expired" | "invalid" | "malformed" };

function isPurpose(value: unknown): value is TokenPurpose {
  return TOKEN_PURPOSES.some((purpose) => purpose === value);
}

function isIdentityPurpose(value: TokenPurpose): value is IdentityPurpose {
  return value === "access" || value === "refresh";
}

/** Narrow a decoded payload to the claim shapes this service issues. */
export function parseClaims(payload: string | jwt.JwtPayload): TokenClaims | null {
  if (typeof payload === "string") return null;
  const { type, email, iat, exp, jti } = payload;
  if (!isPurpose(type) || typeof email !== "string" || typeof iat !== "number" || typeof exp !== "number") {
    return null;
  }
  if (isIdentityPurpose(type)) {
    const { sub, name } = payload;
    if (typeof sub !== "string" || !sub || typeof name !== "string") return null;
    return { type, sub, email, name, iat, exp, jti };
  }
  return { type, email, iat, exp, jti };
}

/**
 * Check signature, algorithm and expiry, then the claim shape. The reason is
 * for logs only; callers outside the issuer see a single invalid result.
 */
export function verifyToken(token: string, config: JwtConfig, now: Date): VerifyOutcome {
  try {
    const payload = jwt.verify(token, config.secret, {
      algorithms: [config.algorithm],
      clockTimestamp: Math.floor(now.getTime() / 1000),
    });
    const claims = parseClaims(payload);
    return claims ? { valid: true, claims } : { valid: false, reason: "malformed" };
  } catch (error) {
    if (error instanceof jwt.TokenExpiredError) {
      return { valid: false, reason: "expired" };
    }
    return { valid: false, reason: "invalid" };
  }
}
