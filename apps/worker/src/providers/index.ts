import type { Config } from "@missive/config";
import type { Logger } from "../logger.js";
import type { EmailProvider } from "./types.js";
import { ResendProvider } from "./resend-provider.js";
import { MockEmailProvider } from "./mock-provider.js";
import { SESProvider } from "./ses-provider.js";

export * from "./types.js";
export { ResendProvider } from "./resend-provider.js";
export { MockEmailProvider, type MockMode } from "./mock-provider.js";
export { SESProvider } from "./ses-provider.js";

export type ProviderConfig = Pick<
  Config,
  | "EMAIL_PROVIDER"
  | "RESEND_API_KEY"
  | "AWS_REGION"
  | "AWS_ACCESS_KEY_ID"
  | "AWS_SECRET_ACCESS_KEY"
  | "SES_ENDPOINT"
  | "MOCK_MODE"
  | "MOCK_FAILURE_RATE"
  | "MOCK_LATENCY_MS"
>;

/**
 * Build the transport named by EMAIL_PROVIDER.
 */
export function createEmailProvider(config: ProviderConfig, logger: Logger): EmailProvider {
  switch (config.EMAIL_PROVIDER) {
    case "mock":
      logger.info({ provider: "mock", mode: config.MOCK_MODE }, "initialized");
      return new MockEmailProvider({
        mode: config.MOCK_MODE,
        failureRate: config.MOCK_FAILURE_RATE,
        latencyMs: config.MOCK_LATENCY_MS,
        logger,
      });

    case "ses":
      logger.info({ provider: "ses", region: config.AWS_REGION, endpoint: config.SES_ENDPOINT }, "initialized");
      return new SESProvider({
        region: config.AWS_REGION,
        accessKeyId: config.AWS_ACCESS_KEY_ID,
        secretAccessKey: config.AWS_SECRET_ACCESS_KEY,
        endpoint: config.SES_ENDPOINT,
      });

    case "resend":
      if (!config.RESEND_API_KEY) {
        throw new Error("RESEND_API_KEY is required when EMAIL_PROVIDER=resend");
      }
      logger.info({ provider: "resend" }, "initialized");
      return new ResendProvider(config.RESEND_API_KEY);
  }
}
