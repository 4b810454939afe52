import { createLogger } from "../utils/logger";
import { TemplateNotifier, type OutgoingEmail } from "./templateNotifier";

const log = createLogger("email");

/**
 * Development notifier: writes each message to the log instead of sending it.
 * Links are printed in full so flows can be finished by hand.
 */
export class ConsoleNotifier extends TemplateNotifier {
  protected async dispatch(email: OutgoingEmail): Promise<boolean> {
    const lines = [
      `EMAIL (console mode) ${email.kind}`,
      `To: ${email.to}`,
      `Subject: ${email.subject}`,
    ];
    if (email.link) {
      lines.push(`Link: ${email.link}`);
    }
    log.info(lines.join("\n"));
    return true;
  }
}
