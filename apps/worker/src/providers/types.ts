/**
 * Mail transport abstraction.
 * Providers report failures in the result; they never throw for a rejected send.
 */

export interface SendEmailRequest {
  to: string;
  from: string;
  fromName?: string;
  cc?: string[];
  bcc?: string[];
  subject: string;
  html?: string;
  text: string;
  /** Delivery log id, for providers that accept a client reference */
  reference?: string;
}

export interface SendEmailResult {
  success: boolean;
  /** Provider's message id; becomes the delivery log's correlation id */
  providerMessageId?: string;
  error?: string;
}

export interface EmailProvider {
  /** Provider name for logging and metrics */
  readonly name: string;

  send(request: SendEmailRequest): Promise<SendEmailResult>;
}

export function formatFromAddress(request: Pick<SendEmailRequest, "from" | "fromName">): string {
  return request.fromName ? `${request.fromName} <${request.from}>` : request.from;
}
