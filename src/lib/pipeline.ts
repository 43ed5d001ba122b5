/**
 * Video review pipeline
 *
 * One uploaded video in, three artifacts out:
 *   video -> audio (ffmpeg) -> transcript (AssemblyAI) -> analysis (Gemini)
 *
 * Stages run strictly in order and any failure aborts the run. Nothing is
 * retried or cleaned up here: the event platform re-runs the whole pipeline,
 * and because artifact keys are derived from the input key, a re-run simply
 * overwrites what an earlier attempt left behind.
 */

import { mkdtemp, rm } from "fs/promises";
import path from "path";
import type { AppConfig } from "./config";
import {
  GenerationError,
  InputFetchError,
  OutputWriteError,
  PipelineError,
  TranscriptionError,
  ExtractionError,
  errorMessage,
} from "./errors";
import { AUDIO_CONTENT_TYPE, AudioExtractor } from "./audio";
import { GenerationService } from "./gemini";
import { ArtifactKeys, artifactKeysFor, isOutputKey } from "./keys";
import { buildAnalysisPrompt } from "./prompt";
import { ObjectStore, toUri } from "./storage";
import { formatTranscript } from "./transcript";
import { TranscriptionService, waitForTranscript } from "./transcription";
import { VideoUploadedEventData } from "../types/events";

export interface PipelineSettings {
  inputBucket: string | null;
  outputBucket: string;
  scratchDir: string;
  languageCode: string;
  pollIntervalMs: number;
  transcriptionTimeoutMs: number;
}

export interface PipelineDeps {
  settings: PipelineSettings;
  storage: ObjectStore;
  extractor: AudioExtractor;
  transcriber: TranscriptionService;
  generator: GenerationService;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export type PipelineResult =
  | {
      status: "success";
      source: string;
      artifacts: { audio: string; transcript: string; analysis: string };
      transcription_job_id: string;
      speaker_count: number;
      transcript_chars: number;
      analysis_chars: number;
      processing_time_ms: number;
    }
  | {
      status: "skipped";
      source: string;
      reason: "unexpected_bucket" | "output_artifact";
    };

// The presigned audio link must outlive the longest transcription wait
const MIN_PRESIGN_SECONDS = 3600;

const PROMPT_MIN_EXPECTED_CHARS = 500;
const PROMPT_MAX_EXPECTED_CHARS = 10000;

export function settingsFromConfig(config: AppConfig): PipelineSettings {
  return {
    inputBucket: config.inputBucket,
    outputBucket: config.outputBucket,
    scratchDir: config.scratchDir,
    languageCode: config.transcription.languageCode,
    pollIntervalMs: config.transcription.pollIntervalMs,
    transcriptionTimeoutMs: config.transcription.timeoutMs,
  };
}

/**
 * Run every stage for one uploaded video.
 *
 * Resolves with a summary on success or when the event is deliberately
 * ignored; rejects with a PipelineError subclass otherwise.
 */
export async function processUploadedVideo(
  event: VideoUploadedEventData,
  deps: PipelineDeps,
): Promise<PipelineResult> {
  const { settings, storage, extractor, transcriber, generator } = deps;
  const now = deps.now ?? Date.now;
  const startTime = now();
  const source = toUri(event);

  console.log(
    JSON.stringify({
      scope: "video_pipeline",
      status: "started",
      event_id: event.event_id,
      bucket: event.bucket,
      key: event.key,
      size: event.size,
    }),
  );

  if (settings.inputBucket && event.bucket !== settings.inputBucket) {
    console.warn(
      JSON.stringify({
        scope: "video_pipeline",
        status: "skipped",
        reason: "unexpected_bucket",
        bucket: event.bucket,
        expected_bucket: settings.inputBucket,
      }),
    );
    return { status: "skipped", source, reason: "unexpected_bucket" };
  }

  if (event.bucket === settings.outputBucket && isOutputKey(event.key)) {
    console.warn(
      JSON.stringify({
        scope: "video_pipeline",
        status: "skipped",
        reason: "output_artifact",
        bucket: event.bucket,
        key: event.key,
      }),
    );
    return { status: "skipped", source, reason: "output_artifact" };
  }

  const log = (fields: Record<string, unknown>) =>
    console.log(
      JSON.stringify({ scope: "video_pipeline", event_id: event.event_id, ...fields }),
    );

  let scratch: string | null = null;

  try {
    const artifactKeys = resolveArtifactKeys(event.key);
    const out = (key: string) => ({ bucket: settings.outputBucket, key });

    scratch = await mkdtemp(path.join(settings.scratchDir, "video-review-"));
    const videoPath = path.join(scratch, `source${path.posix.extname(event.key)}`);
    const audioPath = path.join(scratch, "audio.flac");

    // 1. Download the video
    const videoBytes = await runStage(
      (e) => new InputFetchError(`Failed to download ${source}: ${errorMessage(e)}`, { cause: e }),
      () => storage.download(event, videoPath),
    );
    log({ action: "video_downloaded", size: videoBytes });

    // 2. Extract lossless audio
    const audio = await runStage(
      (e) => new ExtractionError(`Audio extraction failed: ${errorMessage(e)}`, null, "", { cause: e }),
      () => extractor.extract(videoPath, audioPath),
    );
    log({ action: "audio_extracted", size: audio.bytes, duration_ms: audio.durationMs });

    // 3. Upload the audio artifact
    await runStage(
      (e) => new OutputWriteError("audio_upload", `Failed to upload audio: ${errorMessage(e)}`, { cause: e }),
      () => storage.uploadFile(out(artifactKeys.audio), audio.path, AUDIO_CONTENT_TYPE),
    );
    log({ action: "audio_uploaded", key: artifactKeys.audio });

    // 4. Transcribe from storage and wait for the job
    const transcript = await runStage(
      (e) => new TranscriptionError(`Transcription failed: ${errorMessage(e)}`, { cause: e }),
      async () => {
        const presignSeconds = Math.max(
          MIN_PRESIGN_SECONDS,
          Math.ceil((settings.transcriptionTimeoutMs * 2) / 1000),
        );
        const audioUrl = await storage.presign(out(artifactKeys.audio), presignSeconds);
        const jobId = await transcriber.submit({
          audioUrl,
          languageCode: settings.languageCode,
        });
        log({ action: "transcription_submitted", job_id: jobId });

        return waitForTranscript(transcriber, jobId, {
          pollIntervalMs: settings.pollIntervalMs,
          timeoutMs: settings.transcriptionTimeoutMs,
          now: deps.now,
          sleep: deps.sleep,
        });
      },
    );

    const transcriptText = formatTranscript(transcript);
    log({
      action: "transcript_ready",
      job_id: transcript.job_id,
      segments: transcript.segments.length,
      speaker_count: transcript.speaker_count,
      transcript_chars: transcriptText.length,
    });
    if (transcriptText.length === 0) {
      console.warn(
        JSON.stringify({
          scope: "video_pipeline",
          warning: "empty_transcript",
          event_id: event.event_id,
          job_id: transcript.job_id,
        }),
      );
    }

    // 5. Persist the transcript
    await runStage(
      (e) => new OutputWriteError("transcript_write", `Failed to save transcript: ${errorMessage(e)}`, { cause: e }),
      () => storage.putText(out(artifactKeys.transcript), transcriptText),
    );
    log({ action: "transcript_saved", key: artifactKeys.transcript });

    // 6. Ask the model for the coaching analysis
    const prompt = buildAnalysisPrompt(transcriptText);
    log({ action: "prompt_built", prompt_chars: prompt.text.length, transcript_empty: prompt.transcriptEmpty });
    if (
      prompt.text.length < PROMPT_MIN_EXPECTED_CHARS ||
      prompt.text.length > PROMPT_MAX_EXPECTED_CHARS
    ) {
      console.warn(
        JSON.stringify({
          scope: "video_pipeline",
          warning: "unusual_prompt_length",
          event_id: event.event_id,
          prompt_chars: prompt.text.length,
        }),
      );
    }

    const analysis = await runStage(
      (e) => new GenerationError(`Generation failed: ${errorMessage(e)}`, "transport", undefined, { cause: e }),
      () => generator.generate(prompt.text),
    );

    // 7. Persist the analysis
    await runStage(
      (e) => new OutputWriteError("analysis_write", `Failed to save analysis: ${errorMessage(e)}`, { cause: e }),
      () => storage.putText(out(artifactKeys.analysis), analysis),
    );
    log({ action: "analysis_saved", key: artifactKeys.analysis });

    const processingTime = now() - startTime;

    console.log(
      JSON.stringify({
        scope: "video_pipeline",
        status: "success",
        event_id: event.event_id,
        source,
        processing_time_ms: processingTime,
      }),
    );

    return {
      status: "success",
      source,
      artifacts: {
        audio: toUri(out(artifactKeys.audio)),
        transcript: toUri(out(artifactKeys.transcript)),
        analysis: toUri(out(artifactKeys.analysis)),
      },
      transcription_job_id: transcript.job_id,
      speaker_count: transcript.speaker_count,
      transcript_chars: transcriptText.length,
      analysis_chars: analysis.length,
      processing_time_ms: processingTime,
    };
  } catch (error) {
    console.error(
      JSON.stringify({
        scope: "video_pipeline",
        status: "error",
        event_id: event.event_id,
        source,
        stage: error instanceof PipelineError ? error.stage : "unknown",
        error_type: error instanceof PipelineError ? error.errorType : "unknown",
        message: errorMessage(error),
        processing_time_ms: now() - startTime,
      }),
    );
    throw error;
  } finally {
    if (scratch) {
      await removeScratch(scratch);
    }
  }
}

/**
 * Errors already classified by a collaborator pass through untouched;
 * anything else is tagged with the stage it escaped from.
 */
async function runStage<T>(
  wrap: (error: unknown) => PipelineError,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    throw error instanceof PipelineError ? error : wrap(error);
  }
}

function resolveArtifactKeys(objectKey: string): ArtifactKeys {
  try {
    return artifactKeysFor(objectKey);
  } catch (error) {
    throw new InputFetchError(errorMessage(error), { cause: error });
  }
}

async function removeScratch(dir: string): Promise<void> {
  try {
    await rm(dir, { recursive: true, force: true });
  } catch (error) {
    console.error(
      JSON.stringify({
        scope: "video_pipeline",
        action: "scratch_cleanup_error",
        dir,
        error: errorMessage(error),
      }),
    );
  }
}
