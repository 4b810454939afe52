import * as bcrypt from "bcryptjs";
import { randomInt } from "crypto";
import { createLogger } from "./logger";

const log = createLogger("hash");

// ============================= Types & Interfaces =============================

export interface StrengthCheck {
  ok: boolean;
  /** Message of the first rule the password violates, or a confirmation. */
  reason: string;
}

export interface HasherOptions {
  rounds?: number;
}

// ============================= Password Validation =============================

const MIN_PASSWORD_LENGTH = 8;
// bcrypt ignores everything past the first 72 bytes.
export const MAX_PASSWORD_BYTES = 72;

// Matched case-insensitively as substrings.
const COMMON_PATTERNS = ["123456", "qwerty", "abc123"];

function exceedsBcryptLimit(password: string): boolean {
  return Buffer.byteLength(password, "utf8") > MAX_PASSWORD_BYTES;
}

interface StrengthRule {
  test: (password: string) => boolean;
  message: string;
}

const STRENGTH_RULES: StrengthRule[] = [
  {
    test: (password) => password.length >= MIN_PASSWORD_LENGTH,
    message: `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`,
  },
  {
    test: (password) => !exceedsBcryptLimit(password),
    message: `Password must not exceed ${MAX_PASSWORD_BYTES} bytes`,
  },
  {
    test: (password) => /\p{Lu}/u.test(password),
    message: "Password must contain at least one uppercase letter",
  },
  {
    test: (password) => /\p{Ll}/u.test(password),
    message: "Password must contain at least one lowercase letter",
  },
  {
    test: (password) => /\d/.test(password),
    message: "Password must contain at least one number",
  },
  {
    test: (password) => {
      const lowered = password.toLowerCase();
      return !COMMON_PATTERNS.some((pattern) => lowered.includes(pattern));
    },
    message: "Password contains common patterns",
  },
];

export function checkPasswordStrength(password: string): StrengthCheck {
  for (const rule of STRENGTH_RULES) {
    if (!rule.test(password)) {
      return { ok: false, reason: rule.message };
    }
  }
  return { ok: true, reason: "Password is strong" };
}

// ============================= Secure Tokens =============================

const TOKEN_ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

/**
 * Printable random token for verification and reset links. Each character is
 * drawn with crypto.randomInt, which is uniform over the alphabet.
 */
export function generateSecureToken(length = 32): string {
  if (!Number.isInteger(length) || length < 1) {
    throw new RangeError("Token length must be a positive integer");
  }
  let token = "";
  for (let i = 0; i < length; i++) {
    token += TOKEN_ALPHABET[randomInt(TOKEN_ALPHABET.length)];
  }
  return token;
}

// ============================= Password Hashing =============================

export const DEFAULT_BCRYPT_ROUNDS = 12;
export const MIN_BCRYPT_ROUNDS = 4;
export const MAX_BCRYPT_ROUNDS = 15;

export class CredentialHasher {
  readonly rounds: number;
  private dummyHash?: Promise<string>;

  constructor(options: HasherOptions = {}) {
    const rounds = options.rounds ?? DEFAULT_BCRYPT_ROUNDS;
    if (!Number.isInteger(rounds) || rounds < MIN_BCRYPT_ROUNDS || rounds > MAX_BCRYPT_ROUNDS) {
      throw new RangeError(`bcrypt rounds must be an integer between ${MIN_BCRYPT_ROUNDS} and ${MAX_BCRYPT_ROUNDS}`);
    }
    this.rounds = rounds;
  }

  async hash(password: string): Promise<string> {
    const salt = await bcrypt.genSalt(this.rounds);
    return bcrypt.hash(password, salt);
  }

  /** Passwords over the bcrypt limit never match, so no longer input shares a stored prefix. */
  async verify(password: string, hash: string): Promise<boolean> {
    if (exceedsBcryptLimit(password)) return false;
    try {
      return await bcrypt.compare(password, hash);
    } catch (error) {
      log.warn("Password verification failed on a malformed hash:", error instanceof Error ? error.message : String(error));
      return false;
    }
  }

  /**
   * Spend one comparison's worth of work when there is no account to check,
   * so an unknown email costs the same as a wrong password.
   */
  async dummyVerify(password: string): Promise<void> {
    if (!this.dummyHash) {
      this.dummyHash = this.hash(generateSecureToken(24));
    }
    await this.verify(password, await this.dummyHash);
  }

  generateSecureToken(length = 32): string {
    return generateSecureToken(length);
  }

  checkStrength(password: string): StrengthCheck {
    return checkPasswordStrength(password);
  }
}
