import { inngest } from "../client";
import { FfmpegAudioExtractor } from "../../lib/audio";
import { AssemblyAIClient } from "../../lib/assemblyai";
import type { AppConfig } from "../../lib/config";
import { GeminiClient } from "../../lib/gemini";
import {
  PipelineDeps,
  processUploadedVideo,
  settingsFromConfig,
} from "../../lib/pipeline";
import { StorageClient } from "../../lib/storage";
import { VIDEO_UPLOADED_EVENT } from "../../types/events";

/**
 * Build the service clients the pipeline runs against
 */
export function buildPipelineDeps(config: AppConfig): PipelineDeps {
  return {
    settings: settingsFromConfig(config),
    storage: new StorageClient(config.aws),
    extractor: new FfmpegAudioExtractor(
      config.extraction.ffmpegPath,
      config.extraction.timeoutMs,
    ),
    transcriber: new AssemblyAIClient(config.transcription.apiKey),
    generator: new GeminiClient(config.generation.apiKey, config.generation.model),
  };
}

/**
 * Inngest function that turns one uploaded video into audio, transcript and
 * analysis artifacts.
 *
 * No step.run checkpoints: a retry re-runs every stage from the unchanged
 * input and overwrites the same artifact keys.
 */
export function createProcessUploadedVideo(deps: PipelineDeps) {
  return inngest.createFunction(
    {
      id: "process-uploaded-video",
      name: "Process Uploaded Sales Call Video",
      retries: 3,
      concurrency: {
        limit: 4,
      },
      idempotency: "event.data.event_id",
    },
    { event: VIDEO_UPLOADED_EVENT },
    async ({ event, attempt }) => {
      console.log(
        JSON.stringify({
          scope: "process_uploaded_video",
          status: "invoked",
          event_id: event.data.event_id,
          attempt,
        }),
      );

      return processUploadedVideo(event.data, deps);
    },
  );
}
