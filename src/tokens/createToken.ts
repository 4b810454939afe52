import * as jwt from "jsonwebtoken";
import { randomUUID } from "crypto";
import type { JwtConfig } from "../types/config";
import type { TokenPurpose } from "./verifyToken";

/** Claims written by the issuer; `iat`, `exp` and `jti` are added here. */
export interface TokenBody {
  type: TokenPurpose;
  email: string;
  sub?: string;
  name?: string;
}

/**
 * Sign a token with the process-wide secret. `iat` comes from the caller's
 * clock so expiry stays consistent with the rest of the service.
 */
export function createToken(
  body: TokenBody,
  config: JwtConfig,
  ttlSeconds: number,
  now: Date
): string {
  const iat = Math.floor(now.getTime() / 1000);
  return jwt.sign({ ...body, iat }, config.secret, {
    algorithm: config.algorithm,
    expiresIn: ttlSeconds,
    jwtid: randomUUID(),
  });
}
