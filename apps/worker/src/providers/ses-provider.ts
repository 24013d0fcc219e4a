/**
 * AWS SES transport over the v2 SDK.
 */

import type { SendEmailCommandInput, SESv2Client } from "@aws-sdk/client-sesv2";
import { describeCause } from "../errors.js";
import { formatFromAddress, type EmailProvider, type SendEmailRequest, type SendEmailResult } from "./types.js";

export interface SESProviderConfig {
  region: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  /** Custom SES endpoint, e.g. a local emulator */
  endpoint?: string;
}

const UTF8 = "UTF-8";

/**
 * SendEmail input for one message. Pure, so it is tested without AWS.
 */
export function buildSesEmailInput(request: SendEmailRequest): SendEmailCommandInput {
  return {
    FromEmailAddress: formatFromAddress(request),
    Destination: {
      ToAddresses: [request.to],
      CcAddresses: request.cc?.length ? request.cc : undefined,
      BccAddresses: request.bcc?.length ? request.bcc : undefined,
    },
    Content: {
      Simple: {
        Subject: { Data: request.subject, Charset: UTF8 },
        Body: {
          Html: request.html ? { Data: request.html, Charset: UTF8 } : undefined,
          Text: { Data: request.text || " ", Charset: UTF8 },
        },
      },
    },
    EmailTags: request.reference ? [{ Name: "delivery_log_id", Value: request.reference }] : undefined,
  };
}

export class SESProvider implements EmailProvider {
  readonly name = "ses";
  private client: SESv2Client | null = null;

  constructor(private config: SESProviderConfig) {}

  async send(request: SendEmailRequest): Promise<SendEmailResult> {
    try {
      // Loaded lazily so the mock and Resend paths never pull in the AWS SDK
      const { SendEmailCommand } = await import("@aws-sdk/client-sesv2");
      const client = await this.getClient();
      const result = await client.send(new SendEmailCommand(buildSesEmailInput(request)));
      return { success: true, providerMessageId: result.MessageId };
    } catch (error) {
      return { success: false, error: describeCause(error) };
    }
  }

  private async getClient(): Promise<SESv2Client> {
    if (!this.client) {
      const { SESv2Client } = await import("@aws-sdk/client-sesv2");
      const { region, endpoint, accessKeyId, secretAccessKey } = this.config;
      this.client = new SESv2Client({
        region,
        endpoint,
        credentials: accessKeyId && secretAccessKey ? { accessKeyId, secretAccessKey } : undefined,
      });
    }
    return this.client;
  }
}
