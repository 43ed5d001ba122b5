/**
 * Amazon SNS HTTP/S delivery envelopes
 *
 * SNS posts with `Content-Type: text/plain`. Unless raw message delivery is
 * enabled, the S3 notification arrives as a JSON string in the envelope's
 * `Message` field. A body without a `Type` field is treated as the
 * notification itself (raw delivery or a direct forward).
 */

import axios from "axios";
import { errorMessage } from "./errors";
import { ensureString, isRecord } from "./guards";

export type WebhookPayload =
  | { kind: "notification"; body: unknown }
  | { kind: "subscription_confirmation"; topicArn: string; subscribeUrl: string }
  | { kind: "unsubscribe_confirmation"; topicArn: string };

const SNS_HOST = /^sns\.[a-z0-9-]+\.amazonaws\.com(\.cn)?$/;

export function unwrapSnsEnvelope(body: unknown): WebhookPayload {
  if (!isRecord(body) || typeof body.Type !== "string") {
    return { kind: "notification", body };
  }

  switch (body.Type) {
    case "Notification": {
      const message = ensureString(body.Message, "envelope.Message");
      try {
        return { kind: "notification", body: JSON.parse(message) };
      } catch (error) {
        throw new Error(`SNS Message is not JSON: ${errorMessage(error)}`, { cause: error });
      }
    }
    case "SubscriptionConfirmation":
      return {
        kind: "subscription_confirmation",
        topicArn: ensureString(body.TopicArn, "envelope.TopicArn"),
        subscribeUrl: ensureSnsUrl(body.SubscribeURL, "envelope.SubscribeURL"),
      };
    case "UnsubscribeConfirmation":
      return {
        kind: "unsubscribe_confirmation",
        topicArn: ensureString(body.TopicArn, "envelope.TopicArn"),
      };
    default:
      throw new Error(`Unsupported SNS message type "${body.Type}"`);
  }
}

/**
 * Only HTTPS links on an SNS endpoint are followed
 */
export function ensureSnsUrl(v: unknown, name: string): string {
  const raw = ensureString(v, name);
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new Error(`Expected URL for ${name}, got "${raw}"`);
  }
  if (url.protocol !== "https:" || !SNS_HOST.test(url.hostname)) {
    throw new Error(`Refusing non-SNS URL for ${name}: ${url.origin}`);
  }
  return raw;
}

/**
 * Visit the SubscribeURL, which is how an HTTP/S subscription is confirmed
 */
export async function confirmSubscription(subscribeUrl: string): Promise<void> {
  const response = await axios.get<string>(subscribeUrl, {
    timeout: 10000,
    responseType: "text",
  });

  console.log(
    JSON.stringify({
      scope: "sns",
      action: "subscription_confirmed",
      status_code: response.status,
    }),
  );
}
