/**
 * Audio extraction from uploaded video files
 */

import { spawn } from "child_process";
import { stat } from "fs/promises";
import { ExtractionError } from "./errors";

export interface ExtractedAudio {
  path: string;
  bytes: number;
  durationMs: number;
}

export interface AudioExtractor {
  extract(videoPath: string, audioPath: string): Promise<ExtractedAudio>;
}

export const AUDIO_CONTENT_TYPE = "audio/flac";
export const AUDIO_SAMPLE_RATE = 16000;

// ffmpeg prints its full banner and progress to stderr; keep the tail only
const STDERR_TAIL_BYTES = 4096;

/**
 * Lossless mono 16 kHz FLAC, the format the transcription service reads
 * most reliably for speech
 */
export function ffmpegArgs(videoPath: string, audioPath: string): string[] {
  return [
    "-hide_banner",
    "-nostdin",
    "-y",
    "-i",
    videoPath,
    "-vn",
    "-acodec",
    "flac",
    "-ar",
    String(AUDIO_SAMPLE_RATE),
    "-ac",
    "1",
    audioPath,
  ];
}

export class FfmpegAudioExtractor implements AudioExtractor {
  constructor(
    private readonly ffmpegPath: string = "ffmpeg",
    private readonly timeoutMs: number = 8 * 60 * 1000,
  ) {}

  async extract(videoPath: string, audioPath: string): Promise<ExtractedAudio> {
    const startTime = Date.now();
    const args = ffmpegArgs(videoPath, audioPath);

    console.log(
      JSON.stringify({
        scope: "audio_extractor",
        action: "extract_start",
        command: [this.ffmpegPath, ...args].join(" "),
      }),
    );

    const stderr = await this.run(args);

    let bytes: number;
    try {
      bytes = (await stat(audioPath)).size;
    } catch (error) {
      throw new ExtractionError(
        `ffmpeg exited cleanly but produced no file at ${audioPath}`,
        0,
        stderr,
        { cause: error },
      );
    }

    if (bytes === 0) {
      throw new ExtractionError(
        `ffmpeg produced an empty audio file at ${audioPath}`,
        0,
        stderr,
      );
    }

    const durationMs = Date.now() - startTime;

    console.log(
      JSON.stringify({
        scope: "audio_extractor",
        action: "extract_success",
        audio_path: audioPath,
        size: bytes,
        duration_ms: durationMs,
      }),
    );

    return { path: audioPath, bytes, durationMs };
  }

  private run(args: string[]): Promise<string> {
    return new Promise((resolve, reject) => {
      const child = spawn(this.ffmpegPath, args, {
        stdio: ["ignore", "ignore", "pipe"],
      });

      let stderr = "";
      let settled = false;

      const finish = (error: ExtractionError | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (error) {
          console.error(
            JSON.stringify({
              scope: "audio_extractor",
              action: "extract_error",
              exit_code: error.exitCode,
              message: error.message,
              stderr: error.stderr,
            }),
          );
          reject(error);
        } else {
          resolve(stderr);
        }
      };

      const timer = setTimeout(() => {
        child.kill("SIGKILL");
        finish(
          new ExtractionError(
            `ffmpeg timed out after ${this.timeoutMs}ms`,
            null,
            stderr,
          ),
        );
      }, this.timeoutMs);

      child.stderr?.on("data", (chunk: Buffer) => {
        stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL_BYTES);
      });

      child.on("error", (error) => {
        finish(
          new ExtractionError(
            `Failed to start ffmpeg: ${error.message}`,
            null,
            stderr,
            { cause: error },
          ),
        );
      });

      child.on("close", (code) => {
        finish(
          code === 0
            ? null
            : new ExtractionError(
                `ffmpeg failed with exit code ${code}`,
                code,
                stderr,
              ),
        );
      });
    });
  }
}
