/**
 * End-to-end pipeline behaviour against in-memory collaborators
 */

import { describe, it, expect, beforeEach, afterEach, jest } from "@jest/globals";
import { mkdtemp, readdir, readFile, rm, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { AudioExtractor, ExtractedAudio } from "../src/lib/audio";
import {
  ContentFilteredError,
  ExtractionError,
  GenerationError,
  InputFetchError,
  OutputWriteError,
  TranscriptionError,
  TranscriptionTimeoutError,
} from "../src/lib/errors";
import { GenerationService } from "../src/lib/gemini";
import { PipelineDeps, PipelineSettings, processUploadedVideo } from "../src/lib/pipeline";
import { EMPTY_TRANSCRIPT_MARKER } from "../src/lib/prompt";
import { ObjectLocation, ObjectStore } from "../src/lib/storage";
import {
  TranscriptionJobStatus,
  TranscriptionRequest,
  TranscriptionService,
} from "../src/lib/transcription";
import { Transcript } from "../src/types/assemblyai";
import { VideoUploadedEventData } from "../src/types/events";

class MemoryStore implements ObjectStore {
  objects = new Map<string, { body: Buffer; contentType: string }>();
  writes: string[] = [];
  failPutFor: string | null = null;

  private id({ bucket, key }: ObjectLocation) {
    return `${bucket}/${key}`;
  }

  async download(location: ObjectLocation, toPath: string): Promise<number> {
    const object = this.objects.get(this.id(location));
    if (!object) {
      throw new Error("NoSuchKey: The specified key does not exist.");
    }
    await writeFile(toPath, object.body);
    return object.body.length;
  }

  async uploadFile(location: ObjectLocation, fromPath: string, contentType: string) {
    this.writes.push(this.id(location));
    this.objects.set(this.id(location), { body: await readFile(fromPath), contentType });
  }

  async putText(location: ObjectLocation, text: string) {
    if (this.failPutFor === location.key) {
      throw new Error("AccessDenied");
    }
    this.writes.push(this.id(location));
    this.objects.set(this.id(location), {
      body: Buffer.from(text, "utf-8"),
      contentType: "text/plain",
    });
  }

  async presign(location: ObjectLocation, expiresIn = 3600) {
    return `https://${location.bucket}.s3.example.com/${location.key}?expires=${expiresIn}`;
  }

  text(bucket: string, key: string): string | undefined {
    return this.objects.get(`${bucket}/${key}`)?.body.toString("utf-8");
  }
}

class FakeExtractor implements AudioExtractor {
  calls: Array<{ videoPath: string; audioPath: string }> = [];
  failure: Error | null = null;

  async extract(videoPath: string, audioPath: string): Promise<ExtractedAudio> {
    this.calls.push({ videoPath, audioPath });
    if (this.failure) throw this.failure;
    const video = await readFile(videoPath);
    const audio = Buffer.concat([Buffer.from("fLaC"), video]);
    await writeFile(audioPath, audio);
    return { path: audioPath, bytes: audio.length, durationMs: 5 };
  }
}

class FakeTranscriber implements TranscriptionService {
  requests: TranscriptionRequest[] = [];
  statuses: TranscriptionJobStatus[] = [];

  async submit(request: TranscriptionRequest): Promise<string> {
    this.requests.push(request);
    return "tx-1";
  }

  async check(): Promise<TranscriptionJobStatus> {
    return this.statuses.shift() ?? { state: "pending", detail: "processing" };
  }
}

class FakeGenerator implements GenerationService {
  prompts: string[] = [];
  reply: () => Promise<string> = async () => "Coaching: the seller never asked about cost.";

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    return this.reply();
  }
}

const twoSpeakerTranscript: Transcript = {
  job_id: "tx-1",
  speaker_count: 2,
  audio_duration_s: 12,
  segments: [
    { speaker: 1, text: "What is holding you back today?", start_ms: 0, end_ms: 2000 },
    { speaker: 2, text: "Mostly time.", start_ms: 2100, end_ms: 3000 },
  ],
};

const event: VideoUploadedEventData = {
  bucket: "incoming-calls",
  key: "call1.mp4",
  event_id: "incoming-calls/call1.mp4@0001",
};

describe("processUploadedVideo", () => {
  let scratchDir: string;
  let storage: MemoryStore;
  let extractor: FakeExtractor;
  let transcriber: FakeTranscriber;
  let generator: FakeGenerator;
  let settings: PipelineSettings;
  let deps: PipelineDeps;

  beforeEach(async () => {
    scratchDir = await mkdtemp(path.join(os.tmpdir(), "pipeline-test-"));
    storage = new MemoryStore();
    storage.objects.set("incoming-calls/call1.mp4", {
      body: Buffer.from("fake video bytes"),
      contentType: "video/mp4",
    });
    extractor = new FakeExtractor();
    transcriber = new FakeTranscriber();
    transcriber.statuses = [
      { state: "pending", detail: "queued" },
      { state: "completed", transcript: twoSpeakerTranscript },
    ];
    generator = new FakeGenerator();
    settings = {
      inputBucket: null,
      outputBucket: "review-output",
      scratchDir,
      languageCode: "en",
      pollIntervalMs: 10,
      transcriptionTimeoutMs: 1000,
    };
    let clock = 0;
    deps = {
      settings,
      storage,
      extractor,
      transcriber,
      generator,
      now: () => clock,
      sleep: async (ms: number) => {
        clock += ms;
      },
    };
  });

  afterEach(async () => {
    await rm(scratchDir, { recursive: true, force: true });
  });

  it("writes audio, transcript and analysis under keys derived from the video name", async () => {
    const result = await processUploadedVideo(event, deps);

    expect(result).toEqual({
      status: "success",
      source: "s3://incoming-calls/call1.mp4",
      artifacts: {
        audio: "s3://review-output/audio/call1.flac",
        transcript: "s3://review-output/transcripts/call1_transcript.txt",
        analysis: "s3://review-output/analysis/call1_analysis.txt",
      },
      transcription_job_id: "tx-1",
      speaker_count: 2,
      transcript_chars: 67,
      analysis_chars: 44,
      processing_time_ms: 10,
    });

    expect(storage.writes).toEqual([
      "review-output/audio/call1.flac",
      "review-output/transcripts/call1_transcript.txt",
      "review-output/analysis/call1_analysis.txt",
    ]);
    expect(storage.objects.get("review-output/audio/call1.flac")?.contentType).toBe("audio/flac");
    expect(storage.text("review-output", "transcripts/call1_transcript.txt")).toBe(
      "Speaker 1: What is holding you back today?\nSpeaker 2: Mostly time.\n",
    );
    expect(storage.text("review-output", "analysis/call1_analysis.txt")).toBe(
      "Coaching: the seller never asked about cost.",
    );
  });

  it("transcribes from the uploaded audio's storage URL", async () => {
    await processUploadedVideo(event, deps);

    expect(transcriber.requests).toEqual([
      {
        audioUrl: "https://review-output.s3.example.com/audio/call1.flac?expires=3600",
        languageCode: "en",
      },
    ]);
  });

  it("sends the transcript inside the analysis prompt", async () => {
    await processUploadedVideo(event, deps);

    expect(generator.prompts).toHaveLength(1);
    expect(
      generator.prompts[0].endsWith(
        "Transcript:\nSpeaker 1: What is holding you back today?\nSpeaker 2: Mostly time.",
      ),
    ).toBe(true);
  });

  it("produces identical keys and content when the same event is delivered twice", async () => {
    await processUploadedVideo(event, deps);
    const firstWrites = [...storage.writes];
    const firstTranscript = storage.text("review-output", "transcripts/call1_transcript.txt");

    transcriber.statuses = [{ state: "completed", transcript: twoSpeakerTranscript }];
    await processUploadedVideo(event, deps);

    expect(storage.writes).toEqual([...firstWrites, ...firstWrites]);
    expect(storage.text("review-output", "transcripts/call1_transcript.txt")).toBe(firstTranscript);
    // Input plus three artifacts; nothing duplicated
    expect(storage.objects.size).toBe(4);
  });

  it("still runs the analysis when no speech was recognized", async () => {
    transcriber.statuses = [
      {
        state: "completed",
        transcript: { job_id: "tx-1", speaker_count: 0, audio_duration_s: 30, segments: [] },
      },
    ];

    const result = await processUploadedVideo(event, deps);

    expect(result.status).toBe("success");
    expect(storage.text("review-output", "transcripts/call1_transcript.txt")).toBe("");
    expect(generator.prompts[0].endsWith(`Transcript:\n${EMPTY_TRANSCRIPT_MARKER}`)).toBe(true);
  });

  it("removes its scratch files after a successful run", async () => {
    await processUploadedVideo(event, deps);

    expect(await readdir(scratchDir)).toEqual([]);
    expect(extractor.calls[0].videoPath.startsWith(scratchDir)).toBe(true);
    expect(path.basename(extractor.calls[0].videoPath)).toBe("source.mp4");
  });

  it("fails with InputFetchError when the video is missing", async () => {
    storage.objects.clear();

    const promise = processUploadedVideo(event, deps);

    await expect(promise).rejects.toBeInstanceOf(InputFetchError);
    await expect(promise).rejects.toThrow(
      "Failed to download s3://incoming-calls/call1.mp4: NoSuchKey: The specified key does not exist.",
    );
    expect(extractor.calls).toHaveLength(0);
    expect(storage.writes).toEqual([]);
  });

  it("stops after a failed extraction and cleans up scratch space", async () => {
    extractor.failure = new ExtractionError("ffmpeg failed with exit code 1", 1, "moov atom not found");

    await expect(processUploadedVideo(event, deps)).rejects.toMatchObject({
      errorType: "extraction",
      exitCode: 1,
    });
    expect(storage.writes).toEqual([]);
    expect(transcriber.requests).toEqual([]);
    expect(await readdir(scratchDir)).toEqual([]);
  });

  it("wraps unexpected extractor errors as extraction failures", async () => {
    extractor.failure = new Error("EACCES: permission denied");

    await expect(processUploadedVideo(event, deps)).rejects.toMatchObject({
      name: "ExtractionError",
      stage: "extraction",
      message: "Audio extraction failed: EACCES: permission denied",
    });
  });

  it("keeps the audio but writes nothing further when transcription fails", async () => {
    transcriber.statuses = [{ state: "failed", message: "Unsupported audio" }];

    const promise = processUploadedVideo(event, deps);

    await expect(promise).rejects.toBeInstanceOf(TranscriptionError);
    await expect(promise).rejects.not.toBeInstanceOf(TranscriptionTimeoutError);
    expect(storage.writes).toEqual(["review-output/audio/call1.flac"]);
    expect(generator.prompts).toEqual([]);
  });

  it("fails distinctly when the transcription wait times out", async () => {
    transcriber.statuses = [];
    const errors = jest.spyOn(console, "error");

    await expect(processUploadedVideo(event, deps)).rejects.toBeInstanceOf(
      TranscriptionTimeoutError,
    );

    const logged = errors.mock.calls.map((args) => String(args[0]));
    expect(logged.some((line) => line.includes('"error_type":"transcription_timeout"'))).toBe(true);
    errors.mockRestore();
  });

  it("reports content filtering separately from transport failures", async () => {
    generator.reply = async () => {
      throw new ContentFilteredError("candidate blocked (SAFETY)");
    };
    await expect(processUploadedVideo(event, deps)).rejects.toMatchObject({
      errorType: "content_filtered",
    });

    generator.reply = async () => {
      throw new GenerationError("Gemini request timed out", "timeout");
    };
    transcriber.statuses = [{ state: "completed", transcript: twoSpeakerTranscript }];
    await expect(processUploadedVideo(event, deps)).rejects.toMatchObject({
      errorType: "generation",
      kind: "timeout",
    });

    expect(storage.text("review-output", "analysis/call1_analysis.txt")).toBeUndefined();
  });

  it("surfaces output write failures", async () => {
    storage.failPutFor = "analysis/call1_analysis.txt";

    const promise = processUploadedVideo(event, deps);

    await expect(promise).rejects.toBeInstanceOf(OutputWriteError);
    await expect(promise).rejects.toMatchObject({
      stage: "analysis_write",
      message: "Failed to save analysis: AccessDenied",
    });
  });

  it("skips events from a bucket other than the configured input bucket", async () => {
    settings.inputBucket = "other-bucket";

    const result = await processUploadedVideo(event, deps);

    expect(result).toEqual({
      status: "skipped",
      source: "s3://incoming-calls/call1.mp4",
      reason: "unexpected_bucket",
    });
    expect(extractor.calls).toEqual([]);
  });

  it("logs the start of a run with the fields the event carries", async () => {
    const logs = jest.spyOn(console, "log");

    await processUploadedVideo({ ...event, size: 16 }, deps);

    expect(JSON.parse(String(logs.mock.calls[0][0]))).toEqual({
      scope: "video_pipeline",
      status: "started",
      event_id: "incoming-calls/call1.mp4@0001",
      bucket: "incoming-calls",
      key: "call1.mp4",
      size: 16,
    });
    logs.mockRestore();
  });

  it("skips its own output artifacts", async () => {
    const result = await processUploadedVideo(
      { bucket: "review-output", key: "audio/call1.flac", event_id: "e-2" },
      deps,
    );

    expect(result).toMatchObject({ status: "skipped", reason: "output_artifact" });
  });
});
