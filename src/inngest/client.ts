import { EventSchemas, Inngest } from "inngest";
import { VIDEO_UPLOADED_EVENT, VideoUploadedEventData } from "../types/events";

// Define our event types
type Events = {
  [VIDEO_UPLOADED_EVENT]: {
    data: VideoUploadedEventData;
  };
};

// Create type-safe Inngest client
export const inngest = new Inngest({
  id: "sales-call-review",
  schemas: new EventSchemas().fromRecord<Events>(),
});

export type { Events };
