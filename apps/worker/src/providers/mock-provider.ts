import type { Logger } from "../logger.js";
import type { EmailProvider, SendEmailRequest, SendEmailResult } from "./types.js";

export type MockMode = "success" | "fail" | "random";

export interface MockProviderConfig {
  mode: MockMode;
  failureRate?: number;  // 0-1, only used in "random" mode
  latencyMs?: number;    // Simulated network delay
  logger?: Logger;
}

/**
 * Transport stand-in for development and tests. Accepted messages are kept
 * in `sent` for inspection.
 */
export class MockEmailProvider implements EmailProvider {
  readonly name = "mock";
  readonly sent: Array<SendEmailRequest & { providerMessageId: string }> = [];
  private mode: MockMode;
  private failureRate: number;
  private latencyMs: number;
  private logger?: Logger;
  private messageCounter = 0;

  constructor(config: MockProviderConfig) {
    this.mode = config.mode;
    this.failureRate = config.failureRate ?? 0.1;
    this.latencyMs = config.latencyMs ?? 50;
    this.logger = config.logger;
  }

  async send(request: SendEmailRequest): Promise<SendEmailResult> {
    if (this.latencyMs > 0) {
      await this.sleep(this.latencyMs);
    }

    if (this.shouldFail()) {
      this.logger?.debug({ to: request.to, subject: request.subject }, "mock send failed");
      return {
        success: false,
        error: "Simulated failure",
      };
    }

    const messageId = this.generateMessageId();
    this.sent.push({ ...request, providerMessageId: messageId });
    this.logger?.debug({ to: request.to, subject: request.subject, messageId }, "mock send");

    return {
      success: true,
      providerMessageId: messageId,
    };
  }

  setMode(mode: MockMode): void {
    this.mode = mode;
  }

  private shouldFail(): boolean {
    switch (this.mode) {
      case "success":
        return false;
      case "fail":
        return true;
      case "random":
        return Math.random() < this.failureRate;
    }
  }

  private generateMessageId(): string {
    this.messageCounter++;
    return `mock-${Date.now()}-${this.messageCounter.toString().padStart(6, "0")}`;
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}
