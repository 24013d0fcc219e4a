import crypto from "crypto";

// =============================================================================
// Signature Verification
// =============================================================================

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
}

export function signHmac(payload: string, secret: string): string {
  return crypto.createHmac("sha256", secret).update(payload).digest("hex");
}

/**
 * Hex HMAC-SHA256 of the raw body, as sent in `x-webhook-signature`.
 */
export function verifyHmacSignature(payload: string, signature: string | undefined, secret: string): boolean {
  if (!signature) return false;
  return safeEqual(signature.trim().toLowerCase(), signHmac(payload, secret));
}

export interface SvixSignatureInput {
  payload: string;
  id: string | undefined;
  timestamp: string | undefined;
  /** Space-separated `v1,<base64>` entries */
  signature: string | undefined;
  /** `whsec_<base64 key>` */
  secret: string;
  now?: Date;
  toleranceSeconds?: number;
}

export const SVIX_TOLERANCE_SECONDS = 5 * 60;

export function signSvix(id: string, timestamp: string, payload: string, secret: string): string {
  const key = Buffer.from(secret.replace(/^whsec_/, ""), "base64");
  return crypto.createHmac("sha256", key).update(`${id}.${timestamp}.${payload}`).digest("base64");
}

/**
 * Resend signs webhooks with Svix: HMAC-SHA256 over `id.timestamp.body`.
 * Timestamps outside the tolerance window are refused.
 */
export function verifySvixSignature(input: SvixSignatureInput): boolean {
  const { payload, id, timestamp, signature, secret } = input;
  if (!id || !timestamp || !signature) return false;

  const seconds = Number(timestamp);
  if (!Number.isFinite(seconds)) return false;

  const nowSeconds = (input.now ?? new Date()).getTime() / 1000;
  if (Math.abs(nowSeconds - seconds) > (input.toleranceSeconds ?? SVIX_TOLERANCE_SECONDS)) {
    return false;
  }

  const expected = signSvix(id, timestamp, payload, secret);
  return signature
    .split(" ")
    .filter((entry) => entry.startsWith("v1,"))
    .some((entry) => safeEqual(entry.slice(3), expected));
}
