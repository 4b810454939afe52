import type { ServiceConfig } from "../types/config";
import type { Notifier } from "../types/email";
import { ConsoleNotifier } from "./console";
import { SMTPNotifier, type MailTransport } from "./customSMTP";
import type { NotifierSettings } from "./templateNotifier";

export { ConsoleNotifier } from "./console";
export { SMTPNotifier, createSmtpTransport, type MailTransport, type SMTPNotifierOptions } from "./customSMTP";
export { TemplateNotifier, type EmailKind, type NotifierSettings, type OutgoingEmail } from "./templateNotifier";
export * from "./templates";

export function notifierSettings(config: ServiceConfig): NotifierSettings {
  return {
    appName: config.email.appName,
    baseUrl: config.email.baseUrl,
    verificationTtlSeconds: config.tokenTtl.emailVerificationSeconds,
    passwordResetTtlSeconds: config.tokenTtl.passwordResetSeconds,
  };
}

/** Pick the provider named by EMAIL_PROVIDER. */
export function createNotifier(config: ServiceConfig, transport?: MailTransport): Notifier {
  const settings = notifierSettings(config);
  if (config.email.provider === "console") {
    return new ConsoleNotifier(settings);
  }
  if (!config.email.smtp) {
    throw new Error("SMTP configuration is required when EMAIL_PROVIDER=smtp");
  }
  return new SMTPNotifier({
    ...settings,
    smtp: config.email.smtp,
    from: config.email.from,
    fromName: config.email.fromName,
    transport,
  });
}
