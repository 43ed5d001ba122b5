import { inngest } from "../src/inngest/client";
import { stemOf } from "../src/lib/keys";
import { VIDEO_UPLOADED_EVENT } from "../src/types/events";
import * as dotenv from "dotenv";

dotenv.config();

/**
 * CLI script to trigger the pipeline for a video already in storage
 * Usage: npm run trigger <bucket> <key>
 * Example: npm run trigger sales-calls-incoming calls/2024-05-01/call1.mp4
 */
async function main() {
  const [bucket, key] = process.argv.slice(2);

  if (!bucket || !key) {
    console.error("Error: bucket and key are required");
    console.log("Usage: npm run trigger <bucket> <key>");
    console.log("Example: npm run trigger sales-calls-incoming calls/call1.mp4");
    process.exit(1);
  }

  try {
    stemOf(key);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }

  // Manual triggers get a fresh id so they are never deduplicated away
  const eventId = `${bucket}/${key}@manual-${Date.now()}`;

  console.log("Sending event to Inngest:");
  console.log(JSON.stringify({ bucket, key, event_id: eventId }, null, 2));

  try {
    const result = await inngest.send({
      name: VIDEO_UPLOADED_EVENT,
      data: {
        bucket,
        key,
        event_id: eventId,
      },
    });

    console.log("\nEvent sent successfully!");
    console.log("Event ID:", result.ids[0]);
    console.log("\nCheck Inngest Dev Server at http://localhost:8288 to see the function run");
  } catch (error) {
    console.error("Failed to send event:", error);
    console.error("\nMake sure:");
    console.error("1. Inngest Dev Server is running: npm run inngest-dev");
    console.error("2. Express server is running: npm run dev");
    process.exit(1);
  }
}

// Run the script
main().catch((error) => {
  console.error("Unexpected error:", error);
  process.exit(1);
});
