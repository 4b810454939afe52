import { createTransport, type SendMailOptions } from "nodemailer";
import type { SmtpConfig } from "../types/config";
import { createLogger, describeError } from "../utils/logger";
import { TemplateNotifier, type NotifierSettings, type OutgoingEmail } from "./templateNotifier";

const log = createLogger("smtp");

/** The part of a nodemailer transporter the notifier uses. */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId?: string }>;
}

export interface SMTPNotifierOptions extends NotifierSettings {
  smtp: SmtpConfig;
  from: string;
  fromName: string;
  /** Defaults to a nodemailer SMTP transport built from `smtp`. */
  transport?: MailTransport;
}

export function createSmtpTransport(smtp: SmtpConfig): MailTransport {
  return createTransport({
    host: smtp.host,
    port: smtp.port,
    secure: smtp.secure,
    auth: {
      user: smtp.user,
      pass: smtp.pass,
    },
    connectionTimeout: 60000,
    greetingTimeout: 30000,
    socketTimeout: 60000,
  });
}

/**
 * Sends account emails over SMTP. Transport failures are logged and reported
 * as `false`; nothing is retried.
 */
export class SMTPNotifier extends TemplateNotifier {
  private readonly transport: MailTransport;
  private readonly sender: string;

  constructor(options: SMTPNotifierOptions) {
    super(options);
    this.transport = options.transport ?? createSmtpTransport(options.smtp);
    this.sender = `"${options.fromName.replace(/"/g, "'")}" <${options.from}>`;
  }

  protected async dispatch(email: OutgoingEmail): Promise<boolean> {
    try {
      const info = await this.transport.sendMail({
        from: this.sender,
        to: email.to,
        subject: email.subject,
        text: email.text,
        html: email.html,
      });
      log.debug(`Sent ${email.kind} email to ${email.to} (ID: ${info.messageId ?? "n/a"})`);
      return true;
    } catch (error) {
      log.error(`Failed to send ${email.kind} email to ${email.to}: ${describeError(error)}`);
      return false;
    }
  }
}
