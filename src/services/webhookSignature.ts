import { createHmac, timingSafeEqual } from "node:crypto";

// Replicate signs deliveries with the Standard Webhooks scheme
const DEFAULT_TOLERANCE_SECONDS = 5 * 60;

export interface SignedWebhook {
  id: string | undefined;
  timestamp: string | undefined;
  /** Space separated list such as `v1,<base64> v1,<base64>`. */
  signature: string | undefined;
  body: string;
}

export function signWebhookPayload(secret: string, id: string, timestamp: string, body: string): string {
  const key = Buffer.from(secret.replace(/^whsec_/, ""), "base64");
  return createHmac("sha256", key).update(`${id}.${timestamp}.${body}`).digest("base64");
}

export function verifyWebhookSignature(
  webhook: SignedWebhook,
  secret: string,
  options: { now?: Date; toleranceSeconds?: number } = {}
): boolean {
  const { id, timestamp, signature, body } = webhook;
  if (!id || !timestamp || !signature) return false;

  const sentAt = Number(timestamp);
  if (!Number.isInteger(sentAt)) return false;
  const nowSeconds = Math.floor((options.now ?? new Date()).getTime() / 1000);
  if (Math.abs(nowSeconds - sentAt) > (options.toleranceSeconds ?? DEFAULT_TOLERANCE_SECONDS)) return false;

  const expected = Buffer.from(signWebhookPayload(secret, id, timestamp, body));
  return signature.split(" ").some((entry) => {
    const [version, value] = entry.split(",");
    if (version !== "v1" || !value) return false;
    const candidate = Buffer.from(value);
    return candidate.length === expected.length && timingSafeEqual(candidate, expected);
  });
}
