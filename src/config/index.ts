import { randomBytes } from "crypto";
import type {
  EmailProviderName,
  JwtAlgorithm,
  RuntimeEnvironment,
  ServiceConfig,
  SmtpConfig,
} from "../types/config";
import { DEFAULT_BCRYPT_ROUNDS, MAX_BCRYPT_ROUNDS, MIN_BCRYPT_ROUNDS } from "../utils/hash";
import { createLogger, isLogLevel, type LogLevel } from "../utils/logger";

const log = createLogger("config");

type Env = Record<string, string | undefined>;

const JWT_ALGORITHMS: readonly JwtAlgorithm[] = ["HS256", "HS384", "HS512"];
const MIN_SECRET_LENGTH = 12;
const MIN_PRODUCTION_SECRET_LENGTH = 32;

export const DEFAULT_TOKEN_TTL = {
  accessSeconds: 30 * 60,
  refreshSeconds: 7 * 24 * 60 * 60,
  emailVerificationSeconds: 24 * 60 * 60,
  passwordResetSeconds: 60 * 60,
} as const;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function readString(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, key: string, fallback: number, min = 1, max = Number.MAX_SAFE_INTEGER): number {
  const raw = readString(env, key);
  if (raw === undefined) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new ConfigError(`${key} must be a positive integer`);
  }
  const value = Number(raw);
  if (value < min || value > max) {
    throw new ConfigError(`${key} must be between ${min} and ${max}`);
  }
  return value;
}

function readBool(env: Env, key: string, fallback: boolean): boolean {
  const raw = readString(env, key)?.toLowerCase();
  if (raw === undefined) return fallback;
  if (raw === "true" || raw === "1" || raw === "yes") return true;
  if (raw === "false" || raw === "0" || raw === "no") return false;
  throw new ConfigError(`${key} must be true or false`);
}

function resolveEnvironment(env: Env): RuntimeEnvironment {
  const value = readString(env, "NODE_ENV")?.toLowerCase();
  if (value === "production" || value === "test") return value;
  return "development";
}

function resolveLogLevel(env: Env, runtime: RuntimeEnvironment): LogLevel {
  const value = readString(env, "AUTH_LOG_LEVEL")?.toLowerCase();
  if (value === undefined) return runtime === "production" ? "info" : "debug";
  if (!isLogLevel(value)) {
    throw new ConfigError(`AUTH_LOG_LEVEL must be one of debug, info, warn, error, silent`);
  }
  return value;
}

function resolveSecret(env: Env, runtime: RuntimeEnvironment): string {
  const secret = readString(env, "JWT_SECRET");
  if (!secret) {
    if (runtime === "production") {
      throw new ConfigError("JWT_SECRET must be configured in production");
    }
    // Tokens signed with this die with the process.
    log.warn("JWT_SECRET is not set; using a random per-process secret.");
    return randomBytes(32).toString("hex");
  }
  const minLength = runtime === "production" ? MIN_PRODUCTION_SECRET_LENGTH : MIN_SECRET_LENGTH;
  if (secret.length < minLength) {
    throw new ConfigError(`JWT_SECRET must be at least ${minLength} characters`);
  }
  return secret;
}

function resolveAlgorithm(env: Env): JwtAlgorithm {
  const value = readString(env, "JWT_ALGORITHM")?.toUpperCase() ?? "HS256";
  const match = JWT_ALGORITHMS.find((alg) => alg === value);
  if (!match) {
    throw new ConfigError(`JWT_ALGORITHM must be one of ${JWT_ALGORITHMS.join(", ")}`);
  }
  return match;
}

function resolveEmailProvider(env: Env, runtime: RuntimeEnvironment): EmailProviderName {
  const value = readString(env, "EMAIL_PROVIDER")?.toLowerCase();
  if (value === undefined) return runtime === "production" ? "smtp" : "console";
  if (value !== "smtp" && value !== "console") {
    throw new ConfigError("EMAIL_PROVIDER must be smtp or console");
  }
  return value;
}

function resolveSmtp(env: Env): SmtpConfig {
  const host = readString(env, "SMTP_HOST");
  const user = readString(env, "SMTP_USER");
  const pass = readString(env, "SMTP_PASS");
  const missing = [!host && "SMTP_HOST", !user && "SMTP_USER", !pass && "SMTP_PASS"].filter(
    (name): name is string => typeof name === "string"
  );
  if (!host || !user || !pass) {
    throw new ConfigError(`Missing SMTP configuration: ${missing.join(", ")}`);
  }
  const port = readInt(env, "SMTP_PORT", 587, 1, 65535);
  return {
    host,
    port,
    secure: readBool(env, "SMTP_SECURE", port === 465),
    user,
    pass,
  };
}

/**
 * Build the service configuration once at startup. Business code receives the
 * result by reference and never reads the environment itself.
 */
export function loadConfig(env: Env = process.env): ServiceConfig {
  const runtime = resolveEnvironment(env);
  const provider = resolveEmailProvider(env, runtime);
  const appName = readString(env, "APP_NAME") ?? "Accounts";

  const config: ServiceConfig = {
    env: runtime,
    port: readInt(env, "PORT", 8000, 1, 65535),
    logLevel: resolveLogLevel(env, runtime),
    jwt: {
      secret: resolveSecret(env, runtime),
      algorithm: resolveAlgorithm(env),
    },
    tokenTtl: {
      accessSeconds: readInt(env, "ACCESS_TOKEN_TTL_SECONDS", DEFAULT_TOKEN_TTL.accessSeconds),
      refreshSeconds: readInt(env, "REFRESH_TOKEN_TTL_SECONDS", DEFAULT_TOKEN_TTL.refreshSeconds),
      emailVerificationSeconds: readInt(
        env,
        "EMAIL_VERIFICATION_TTL_SECONDS",
        DEFAULT_TOKEN_TTL.emailVerificationSeconds
      ),
      passwordResetSeconds: readInt(env, "PASSWORD_RESET_TTL_SECONDS", DEFAULT_TOKEN_TTL.passwordResetSeconds),
    },
    passwords: {
      bcryptRounds: readInt(env, "BCRYPT_ROUNDS", DEFAULT_BCRYPT_ROUNDS, MIN_BCRYPT_ROUNDS, MAX_BCRYPT_ROUNDS),
    },
    email: {
      provider,
      from: readString(env, "EMAIL_FROM") ?? "noreply@localhost",
      fromName: readString(env, "EMAIL_FROM_NAME") ?? appName,
      appName,
      baseUrl: (readString(env, "CLIENT_BASE_URL") ?? "http://localhost:3000").replace(/\/+$/, ""),
      smtp: provider === "smtp" ? resolveSmtp(env) : undefined,
    },
    store: {
      mongoUri: readString(env, "MONGO_URI"),
      dbName: readString(env, "DB_NAME") ?? "accounts",
      collection: readString(env, "ACCOUNT_COLLECTION") ?? "accounts",
    },
  };

  return deepFreeze(config);
}

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}
