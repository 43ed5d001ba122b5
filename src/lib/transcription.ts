/**
 * Long-running transcription jobs and the bounded wait for their completion
 */

import { TranscriptionError, TranscriptionTimeoutError } from "./errors";
import { Transcript } from "../types/assemblyai";

export interface TranscriptionRequest {
  audioUrl: string;
  languageCode: string;
}

export type TranscriptionJobStatus =
  | { state: "pending"; detail: string }
  | { state: "completed"; transcript: Transcript }
  | { state: "failed"; message: string };

export interface TranscriptionService {
  submit(request: TranscriptionRequest): Promise<string>;
  check(jobId: string): Promise<TranscriptionJobStatus>;
}

export interface WaitOptions {
  pollIntervalMs: number;
  timeoutMs: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Poll a job until it reaches a terminal state.
 *
 * Throws TranscriptionError when the service reports the job failed and
 * TranscriptionTimeoutError once `timeoutMs` has elapsed without a result.
 * The last sleep is shortened so the deadline is never overshot by more than
 * one status request.
 */
export async function waitForTranscript(
  service: TranscriptionService,
  jobId: string,
  options: WaitOptions,
): Promise<Transcript> {
  const now = options.now ?? Date.now;
  const sleep = options.sleep ?? defaultSleep;
  const start = now();
  let polls = 0;

  for (;;) {
    const status = await service.check(jobId);
    polls++;

    if (status.state === "completed") {
      console.log(
        JSON.stringify({
          scope: "transcription",
          action: "job_completed",
          job_id: jobId,
          polls,
          waited_ms: now() - start,
        }),
      );
      return status.transcript;
    }

    if (status.state === "failed") {
      throw new TranscriptionError(
        `Transcription job ${jobId} failed: ${status.message}`,
      );
    }

    const elapsed = now() - start;
    if (elapsed >= options.timeoutMs) {
      throw new TranscriptionTimeoutError(jobId, elapsed);
    }

    console.log(
      JSON.stringify({
        scope: "transcription",
        action: "job_poll",
        job_id: jobId,
        status: status.detail,
        elapsed_ms: elapsed,
      }),
    );

    await sleep(Math.min(options.pollIntervalMs, options.timeoutMs - elapsed));
  }
}
