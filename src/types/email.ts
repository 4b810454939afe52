/**
 * Outbound messages sent on behalf of the auth flows. Each method resolves to
 * whether the delivery attempt succeeded; callers treat `false` and a
 * rejection the same way.
 */
export interface Notifier {
  sendVerification(email: string, name: string, token: string): Promise<boolean>;
  sendPasswordReset(email: string, name: string, token: string): Promise<boolean>;
  sendWelcome(email: string, name: string): Promise<boolean>;
  sendPasswordChanged(email: string, name: string): Promise<boolean>;
}

export interface RenderedEmail {
  subject: string;
  html: string;
  text: string;
}

export interface TemplateContext {
  appName: string;
  name: string;
  /** Present for messages that carry a verification or reset link. */
  link?: string;
  /** Human readable link lifetime, e.g. "24 hours". */
  expiresIn?: string;
}
