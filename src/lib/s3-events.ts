/**
 * Parsing of S3 event notifications into pipeline trigger events
 *
 * S3 delivers notifications at least once. The sequencer is what
 * distinguishes two writes to the same key, so it goes into the event id:
 * a redelivered notification maps to the same id, a re-upload to a new one.
 */

import { VideoUploadedEventData } from "../types/events";
import { ensureArray, ensureRecord, ensureString } from "./guards";

export interface TriggerFromNotification {
  id: string;
  data: VideoUploadedEventData;
}

/**
 * Object keys arrive URL-encoded, with `+` standing in for spaces
 */
export function decodeObjectKey(raw: string): string {
  return decodeURIComponent(raw.replace(/\+/g, " "));
}

export function parseS3Notification(body: unknown): TriggerFromNotification[] {
  const document = ensureRecord(body, "notification");

  // s3:TestEvent is sent once when the notification is configured
  if (document.Event === "s3:TestEvent") {
    return [];
  }

  const records = ensureArray(document.Records, "notification.Records");
  const triggers: TriggerFromNotification[] = [];

  records.forEach((entry, index) => {
    const record = ensureRecord(entry, `Records[${index}]`);
    const eventName = ensureString(record.eventName, `Records[${index}].eventName`);
    if (!eventName.startsWith("ObjectCreated:")) {
      return;
    }

    const s3 = ensureRecord(record.s3, `Records[${index}].s3`);
    const bucket = ensureString(
      ensureRecord(s3.bucket, `Records[${index}].s3.bucket`).name,
      `Records[${index}].s3.bucket.name`,
    );
    const object = ensureRecord(s3.object, `Records[${index}].s3.object`);
    const key = decodeObjectKey(
      ensureString(object.key, `Records[${index}].s3.object.key`),
    );
    const sequencer =
      typeof object.sequencer === "string" && object.sequencer
        ? object.sequencer
        : typeof object.eTag === "string" && object.eTag
          ? object.eTag
          : null;

    const eventId = sequencer ? `${bucket}/${key}@${sequencer}` : `${bucket}/${key}`;
    const data: VideoUploadedEventData = { bucket, key, event_id: eventId };
    if (typeof object.size === "number") {
      data.size = object.size;
    }

    triggers.push({ id: eventId, data });
  });

  return triggers;
}
