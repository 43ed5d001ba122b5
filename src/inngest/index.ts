import { serve } from "inngest/express";
import express from "express";
import * as dotenv from "dotenv";
import { inngest } from "./client";
import { buildPipelineDeps, createProcessUploadedVideo } from "./functions/process_video";
import { AppConfig, loadConfig } from "../lib/config";
import { errorMessage } from "../lib/errors";
import { confirmSubscription } from "../lib/sns";
import { createS3WebhookHandler, S3WebhookOptions } from "./webhook";

dotenv.config();

export type AppDeps = Partial<Pick<S3WebhookOptions, "sendEvents" | "confirmSubscription">>;

export function createApp(config = loadConfig(), deps: AppDeps = {}): express.Express {
  const processUploadedVideo = createProcessUploadedVideo(buildPipelineDeps(config));

  const app = express();

  // Add logging middleware
  app.use((req, _res, next) => {
    console.log(`${new Date().toISOString()} ${req.method} ${req.path}`);
    next();
  });

  // SNS posts JSON bodies as text/plain
  app.use(
    express.json({
      limit: config.server.bodyLimit,
      type: ["application/json", "text/plain"],
    }),
  );

  app.get("/healthz", (_req, res) => {
    res.status(200).json({ status: "ok" });
  });

  // S3 event notifications, posted directly or through an SNS subscription
  const secret = config.server.webhookSecret;
  if (secret) {
    app.post(
      "/webhooks/s3",
      createS3WebhookHandler({
        secret,
        sendEvents: deps.sendEvents ?? ((events) => inngest.send(events)),
        confirmSubscription: deps.confirmSubscription ?? confirmSubscription,
      }),
    );
  } else {
    console.warn(
      JSON.stringify({
        scope: "server",
        warning: "webhook_disabled",
        message: "WEBHOOK_SECRET is not set; /webhooks/s3 is not mounted",
      }),
    );
  }

  // Serve Inngest functions
  app.use(
    "/api/inngest",
    serve({
      client: inngest,
      functions: [processUploadedVideo],
    }),
  );

  return app;
}

if (require.main === module) {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (error) {
    console.error(
      JSON.stringify({
        scope: "server",
        status: "error",
        error_type: "config",
        message: errorMessage(error),
      }),
    );
    process.exit(1);
  }
  const app = createApp(config);

  app.listen(config.server.port, () => {
    console.log(`Inngest server running on http://localhost:${config.server.port}`);
    console.log(`Inngest endpoint: http://localhost:${config.server.port}/api/inngest`);
  });
}
