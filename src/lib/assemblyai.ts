/**
 * AssemblyAI API client for transcription services
 *
 * Jobs are submitted with a URL the service can fetch (a presigned link to
 * the uploaded audio) and polled by id. Diarization is capped at
 * `maxSpeakers`, and the normalized transcript enforces the same cap.
 */

import axios, { AxiosInstance } from "axios";
import {
  AssemblyAITranscript,
  AssemblyAITranscriptRequest,
} from "../types/assemblyai";
import { TranscriptionError } from "./errors";
import {
  TranscriptionJobStatus,
  TranscriptionRequest,
  TranscriptionService,
} from "./transcription";
import { MAX_SPEAKERS, normalizeTranscript } from "./transcript";

export const ASSEMBLYAI_BASE_URL = "https://api.assemblyai.com";

export class AssemblyAIClient implements TranscriptionService {
  private client: AxiosInstance;

  constructor(
    apiKey: string,
    private readonly maxSpeakers: number = MAX_SPEAKERS,
  ) {
    if (!apiKey) {
      throw new Error("ASSEMBLYAI_API_KEY is required");
    }

    this.client = axios.create({
      baseURL: ASSEMBLYAI_BASE_URL,
      headers: {
        Authorization: apiKey,
        "Content-Type": "application/json",
      },
      timeout: 60000,
    });
  }

  buildRequest(request: TranscriptionRequest): AssemblyAITranscriptRequest {
    return {
      audio_url: request.audioUrl,
      language_code: request.languageCode,
      punctuate: true,
      format_text: true,
      speaker_labels: true,
      speaker_options: {
        min_speakers_expected: 1,
        max_speakers_expected: this.maxSpeakers,
      },
    };
  }

  /**
   * Create a transcript job and return its id
   */
  async submit(request: TranscriptionRequest): Promise<string> {
    const body = this.buildRequest(request);

    try {
      console.log(
        JSON.stringify({
          scope: "assemblyai_client",
          action: "submit_start",
          language_code: body.language_code,
          max_speakers: this.maxSpeakers,
        }),
      );

      const response = await this.client.post<AssemblyAITranscript>(
        "/v2/transcript",
        body,
      );

      if (!response.data?.id) {
        throw new TranscriptionError(
          "AssemblyAI accepted the request but returned no transcript id",
        );
      }

      console.log(
        JSON.stringify({
          scope: "assemblyai_client",
          action: "submit_success",
          job_id: response.data.id,
          status: response.data.status,
        }),
      );

      return response.data.id;
    } catch (error) {
      throw this.toTranscriptionError(error, "submit");
    }
  }

  /**
   * Fetch the job once and map it onto a terminal or pending status
   */
  async check(jobId: string): Promise<TranscriptionJobStatus> {
    let job: AssemblyAITranscript;
    try {
      const response = await this.client.get<AssemblyAITranscript>(
        `/v2/transcript/${encodeURIComponent(jobId)}`,
      );
      job = response.data;
    } catch (error) {
      throw this.toTranscriptionError(error, "check");
    }

    switch (job.status) {
      case "completed":
        return {
          state: "completed",
          transcript: normalizeTranscript(job, this.maxSpeakers),
        };
      case "error":
        return {
          state: "failed",
          message: job.error || "unknown transcription error",
        };
      case "queued":
      case "processing":
        return { state: "pending", detail: job.status };
      default:
        return {
          state: "failed",
          message: `unexpected job status "${String(job.status)}"`,
        };
    }
  }

  /**
   * Log API errors and wrap them with a readable message
   */
  private toTranscriptionError(
    error: unknown,
    action: "submit" | "check",
  ): TranscriptionError {
    if (error instanceof TranscriptionError) {
      return error;
    }

    if (axios.isAxiosError(error)) {
      const status = error.response?.status;

      console.error(
        JSON.stringify({
          scope: "assemblyai_client",
          action: `${action}_error`,
          status_code: status,
          error_message: error.message,
          error_data: error.response?.data,
        }),
      );

      if (status === 401) {
        return new TranscriptionError(
          "AssemblyAI authentication failed. Check API key.",
          { cause: error },
        );
      }
      if (status === 429) {
        return new TranscriptionError(
          "AssemblyAI rate limit exceeded. Retry later.",
          { cause: error },
        );
      }
      if (status === 400) {
        return new TranscriptionError(
          `AssemblyAI bad request: ${JSON.stringify(error.response?.data)}`,
          { cause: error },
        );
      }
      return new TranscriptionError(
        `AssemblyAI ${action} failed: ${error.message}`,
        { cause: error },
      );
    }

    console.error(
      JSON.stringify({
        scope: "assemblyai_client",
        action: `${action}_error`,
        error_type: "unknown",
        error: error instanceof Error ? error.message : String(error),
      }),
    );
    return new TranscriptionError(
      `AssemblyAI ${action} failed: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error },
    );
  }
}
