import type { LogLevel } from "../utils/logger";

export type RuntimeEnvironment = "development" | "test" | "production";
export type JwtAlgorithm = "HS256" | "HS384" | "HS512";
export type EmailProviderName = "smtp" | "console";

export interface JwtConfig {
  secret: string;
  algorithm: JwtAlgorithm;
}

/** Lifetimes in seconds, one per token purpose. */
export interface TokenTtlConfig {
  accessSeconds: number;
  refreshSeconds: number;
  emailVerificationSeconds: number;
  passwordResetSeconds: number;
}

export interface SmtpConfig {
  host: string;
  port: number;
  secure: boolean;
  user: string;
  pass: string;
}

export interface EmailConfig {
  provider: EmailProviderName;
  from: string;
  fromName: string;
  appName: string;
  /** Client application origin used to build verification and reset links. */
  baseUrl: string;
  smtp?: SmtpConfig;
}

export interface StoreConfig {
  mongoUri?: string;
  dbName: string;
  collection: string;
}

export interface ServiceConfig {
  env: RuntimeEnvironment;
  port: number;
  logLevel: LogLevel;
  jwt: JwtConfig;
  tokenTtl: TokenTtlConfig;
  passwords: {
    bcryptRounds: number;
  };
  email: EmailConfig;
  store: StoreConfig;
}
