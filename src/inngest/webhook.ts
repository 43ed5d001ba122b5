import { timingSafeEqual } from "crypto";
import express from "express";
import { errorMessage } from "../lib/errors";
import { parseS3Notification, TriggerFromNotification } from "../lib/s3-events";
import { unwrapSnsEnvelope, WebhookPayload } from "../lib/sns";
import { VIDEO_UPLOADED_EVENT, VideoUploadedEvent } from "../types/events";

export interface S3WebhookOptions {
  secret: string;
  sendEvents: (events: VideoUploadedEvent[]) => Promise<{ ids: string[] }>;
  confirmSubscription: (subscribeUrl: string) => Promise<void>;
}

/**
 * Shared secret from the `x-webhook-secret` header, or from `?token=` for
 * senders such as SNS that cannot set headers
 */
export function hasWebhookSecret(req: express.Request, secret: string): boolean {
  const supplied =
    req.get("x-webhook-secret") ??
    (typeof req.query.token === "string" ? req.query.token : undefined);
  if (!supplied) {
    return false;
  }
  const given = Buffer.from(supplied);
  const expected = Buffer.from(secret);
  return given.length === expected.length && timingSafeEqual(given, expected);
}

/**
 * POST handler for S3 event notifications, direct or via SNS
 */
export function createS3WebhookHandler(options: S3WebhookOptions): express.RequestHandler {
  return async (req, res) => {
    if (!hasWebhookSecret(req, options.secret)) {
      console.warn(
        JSON.stringify({ scope: "s3_webhook", status: "rejected", reason: "unauthorized" }),
      );
      res.status(401).json({ error: "unauthorized" });
      return;
    }

    let payload: WebhookPayload;
    let triggers: TriggerFromNotification[] = [];
    try {
      payload = unwrapSnsEnvelope(req.body);
      if (payload.kind === "notification") {
        triggers = parseS3Notification(payload.body);
      }
    } catch (error) {
      console.error(
        JSON.stringify({
          scope: "s3_webhook",
          status: "error",
          error_type: "validation",
          message: errorMessage(error),
        }),
      );
      res.status(400).json({ error: errorMessage(error) });
      return;
    }

    if (payload.kind === "subscription_confirmation") {
      try {
        await options.confirmSubscription(payload.subscribeUrl);
        res.status(200).json({ confirmed: true });
      } catch (error) {
        console.error(
          JSON.stringify({
            scope: "s3_webhook",
            status: "error",
            error_type: "subscription_confirm",
            topic_arn: payload.topicArn,
            message: errorMessage(error),
          }),
        );
        res.status(502).json({ error: "failed to confirm subscription" });
      }
      return;
    }

    if (payload.kind === "unsubscribe_confirmation") {
      console.warn(
        JSON.stringify({
          scope: "s3_webhook",
          action: "unsubscribed",
          topic_arn: payload.topicArn,
        }),
      );
      res.status(200).json({ confirmed: false });
      return;
    }

    if (triggers.length === 0) {
      res.status(200).json({ sent: 0, ids: [] });
      return;
    }

    try {
      const result = await options.sendEvents(
        triggers.map((t) => ({ id: t.id, name: VIDEO_UPLOADED_EVENT, data: t.data })),
      );

      console.log(
        JSON.stringify({
          scope: "s3_webhook",
          action: "events_sent",
          count: triggers.length,
          event_ids: triggers.map((t) => t.id),
        }),
      );

      res.status(202).json({ sent: triggers.length, ids: result.ids });
    } catch (error) {
      console.error(
        JSON.stringify({
          scope: "s3_webhook",
          status: "error",
          error_type: "event_send",
          message: errorMessage(error),
        }),
      );
      // Non-2xx makes the notifier redeliver
      res.status(502).json({ error: "failed to enqueue events" });
    }
  };
}
