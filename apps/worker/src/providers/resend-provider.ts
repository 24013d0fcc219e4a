import { Resend } from "resend";
import { describeCause } from "../errors.js";
import { formatFromAddress, type EmailProvider, type SendEmailRequest, type SendEmailResult } from "./types.js";

/** The part of the Resend SDK this provider calls */
export type ResendEmails = Pick<Resend["emails"], "send">;

/**
 * Resend transport. The delivery log id travels as a tag and an
 * X-Entity-Ref-ID header, so Resend threads nothing together across logs.
 */
export class ResendProvider implements EmailProvider {
  readonly name = "resend";
  private emails: ResendEmails;

  constructor(apiKey: string, emails?: ResendEmails) {
    this.emails = emails ?? new Resend(apiKey).emails;
  }

  async send(request: SendEmailRequest): Promise<SendEmailResult> {
    try {
      const { data, error } = await this.emails.send({
        from: formatFromAddress(request),
        to: request.to,
        cc: request.cc?.length ? request.cc : undefined,
        bcc: request.bcc?.length ? request.bcc : undefined,
        subject: request.subject,
        html: request.html,
        // Resend refuses an empty text part
        text: request.text || " ",
        headers: request.reference ? { "X-Entity-Ref-ID": request.reference } : undefined,
        tags: request.reference ? [{ name: "delivery_log_id", value: request.reference }] : undefined,
      });

      if (error) {
        return { success: false, error: `${error.name}: ${error.message}` };
      }
      return { success: true, providerMessageId: data?.id };
    } catch (error) {
      return { success: false, error: describeCause(error) };
    }
  }
}
