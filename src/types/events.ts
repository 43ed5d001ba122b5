/**
 * Event payloads flowing into the pipeline
 */

export const VIDEO_UPLOADED_EVENT = "storage/video.uploaded";

export interface VideoUploadedEventData {
  bucket: string;
  key: string;
  // Stable across redeliveries of the same upload notification
  event_id: string;
  size?: number;
}

export interface VideoUploadedEvent {
  id: string;
  name: typeof VIDEO_UPLOADED_EVENT;
  data: VideoUploadedEventData;
}
