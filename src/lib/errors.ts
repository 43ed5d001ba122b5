/**
 * Error types for the video review pipeline
 *
 * Every stage failure is fatal to the invocation. The `errorType` is what ends
 * up in the `error_type` log field, so timeouts and content-policy rejections
 * can be told apart from ordinary service failures.
 */

export type PipelineStage =
  | "input_fetch"
  | "extraction"
  | "audio_upload"
  | "transcription"
  | "transcript_write"
  | "generation"
  | "analysis_write";

export type PipelineErrorType =
  | "input_fetch"
  | "extraction"
  | "transcription"
  | "transcription_timeout"
  | "generation"
  | "content_filtered"
  | "output_write";

export abstract class PipelineError extends Error {
  abstract readonly stage: PipelineStage;
  abstract readonly errorType: PipelineErrorType;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InputFetchError extends PipelineError {
  readonly stage = "input_fetch";
  readonly errorType = "input_fetch";
}

export class ExtractionError extends PipelineError {
  readonly stage = "extraction";
  readonly errorType = "extraction";

  constructor(
    message: string,
    readonly exitCode: number | null = null,
    readonly stderr: string = "",
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class TranscriptionError extends PipelineError {
  readonly stage = "transcription";
  readonly errorType: PipelineErrorType = "transcription";
}

/**
 * The transcript job did not finish inside the allowed wait. This is a
 * systemic limit (audio too long for the configured budget), not a blip.
 */
export class TranscriptionTimeoutError extends TranscriptionError {
  readonly errorType = "transcription_timeout";

  constructor(
    readonly jobId: string,
    readonly waitedMs: number,
  ) {
    super(`Transcription job ${jobId} did not complete within ${waitedMs}ms`);
  }
}

export class GenerationError extends PipelineError {
  readonly stage = "generation";
  readonly errorType: PipelineErrorType = "generation";

  constructor(
    message: string,
    readonly kind: "timeout" | "transport",
    readonly statusCode?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/**
 * The model answered, but with nothing usable: the prompt or the candidate
 * was blocked, or the text came back empty.
 */
export class ContentFilteredError extends PipelineError {
  readonly stage = "generation";
  readonly errorType = "content_filtered";

  constructor(readonly reason: string) {
    super(`Generation response rejected by content policy: ${reason}`);
  }
}

export class OutputWriteError extends PipelineError {
  readonly errorType = "output_write";

  constructor(
    readonly stage: "audio_upload" | "transcript_write" | "analysis_write",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ConfigError extends Error {
  constructor(readonly missing: string[], readonly invalid: string[] = []) {
    const parts: string[] = [];
    if (missing.length > 0) {
      parts.push(`missing ${missing.join(", ")}`);
    }
    if (invalid.length > 0) {
      parts.push(`invalid ${invalid.join(", ")}`);
    }
    super(`Invalid configuration: ${parts.join("; ")}`);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
