import type { Notifier, RenderedEmail } from "../types/email";
import {
  buildLink,
  describeLifetime,
  passwordChangedEmail,
  passwordResetEmail,
  verificationEmail,
  welcomeEmail,
} from "./templates";

export type EmailKind = "verification" | "password-reset" | "welcome" | "password-changed";

export interface NotifierSettings {
  appName: string;
  /** Client origin, without a trailing slash. */
  baseUrl: string;
  verificationTtlSeconds: number;
  passwordResetTtlSeconds: number;
}

export interface OutgoingEmail extends RenderedEmail {
  to: string;
  kind: EmailKind;
  link?: string;
}

/**
 * Renders the four account emails and hands them to `dispatch`. Providers only
 * decide how a rendered message leaves the process.
 */
export abstract class TemplateNotifier implements Notifier {
  constructor(protected readonly settings: NotifierSettings) {}

  protected abstract dispatch(email: OutgoingEmail): Promise<boolean>;

  sendVerification(email: string, name: string, token: string): Promise<boolean> {
    const link = buildLink(this.settings.baseUrl, "verify-email", token);
    const rendered = verificationEmail({
      appName: this.settings.appName,
      name,
      link,
      expiresIn: describeLifetime(this.settings.verificationTtlSeconds),
    });
    return this.dispatch({ ...rendered, to: email, kind: "verification", link });
  }

  sendPasswordReset(email: string, name: string, token: string): Promise<boolean> {
    const link = buildLink(this.settings.baseUrl, "reset-password", token);
    const rendered = passwordResetEmail({
      appName: this.settings.appName,
      name,
      link,
      expiresIn: describeLifetime(this.settings.passwordResetTtlSeconds),
    });
    return this.dispatch({ ...rendered, to: email, kind: "password-reset", link });
  }

  sendWelcome(email: string, name: string): Promise<boolean> {
    const rendered = welcomeEmail({ appName: this.settings.appName, name });
    return this.dispatch({ ...rendered, to: email, kind: "welcome" });
  }

  sendPasswordChanged(email: string, name: string): Promise<boolean> {
    const rendered = passwordChangedEmail({ appName: this.settings.appName, name });
    return this.dispatch({ ...rendered, to: email, kind: "password-changed" });
  }
}
