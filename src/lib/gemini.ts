/**
 * Gemini API client for the coaching analysis
 */

import axios, { AxiosInstance } from "axios";
import {
  GeminiGenerateRequest,
  GeminiGenerateResponse,
} from "../types/gemini";
import { ContentFilteredError, GenerationError } from "./errors";

export const GEMINI_BASE_URL = "https://generativelanguage.googleapis.com";

// Finish reasons that mean the candidate was cut off by policy, not by length
const BLOCKING_FINISH_REASONS = new Set([
  "SAFETY",
  "RECITATION",
  "BLOCKLIST",
  "PROHIBITED_CONTENT",
  "SPII",
  "IMAGE_SAFETY",
]);

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);

export interface GenerationService {
  generate(prompt: string): Promise<string>;
}

export class GeminiClient implements GenerationService {
  private client: AxiosInstance;

  constructor(
    apiKey: string,
    readonly model: string,
    timeoutMs: number = 300000,
  ) {
    if (!apiKey) {
      throw new Error("GEMINI_API_KEY is required");
    }

    this.client = axios.create({
      baseURL: GEMINI_BASE_URL,
      headers: {
        "x-goog-api-key": apiKey,
        "Content-Type": "application/json",
      },
      timeout: timeoutMs,
    });
  }

  async generate(prompt: string): Promise<string> {
    const body: GeminiGenerateRequest = {
      contents: [{ role: "user", parts: [{ text: prompt }] }],
    };

    console.log(
      JSON.stringify({
        scope: "gemini_client",
        action: "generate_start",
        model: this.model,
        prompt_chars: prompt.length,
      }),
    );

    let data: GeminiGenerateResponse;
    try {
      const response = await this.client.post<GeminiGenerateResponse>(
        `/v1beta/models/${encodeURIComponent(this.model)}:generateContent`,
        body,
      );
      data = response.data;
    } catch (error) {
      throw this.toGenerationError(error);
    }

    const text = extractText(data);

    console.log(
      JSON.stringify({
        scope: "gemini_client",
        action: "generate_success",
        model: this.model,
        model_version: data.modelVersion,
        output_chars: text.length,
        total_tokens: data.usageMetadata?.totalTokenCount,
      }),
    );

    return text;
  }

  private toGenerationError(error: unknown): GenerationError {
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      const kind =
        error.code !== undefined && TIMEOUT_CODES.has(error.code)
          ? "timeout"
          : "transport";

      console.error(
        JSON.stringify({
          scope: "gemini_client",
          action: "generate_error",
          kind,
          status_code: status,
          error_message: error.message,
          error_data: error.response?.data,
        }),
      );

      return new GenerationError(
        kind === "timeout"
          ? `Gemini request timed out: ${error.message}`
          : `Gemini request failed${status ? ` with status ${status}` : ""}: ${error.message}`,
        kind,
        status,
        { cause: error },
      );
    }

    const message = error instanceof Error ? error.message : String(error);
    console.error(
      JSON.stringify({
        scope: "gemini_client",
        action: "generate_error",
        kind: "transport",
        error_message: message,
      }),
    );
    return new GenerationError(`Gemini request failed: ${message}`, "transport", undefined, {
      cause: error,
    });
  }
}

/**
 * Pull the candidate text out of a response, or throw ContentFilteredError
 * when the prompt or candidate was blocked or nothing came back.
 */
export function extractText(response: GeminiGenerateResponse): string {
  const blockReason = response.promptFeedback?.blockReason;
  if (blockReason) {
    throw new ContentFilteredError(`prompt blocked (${blockReason})`);
  }

  const candidate = response.candidates?.[0];
  if (!candidate) {
    throw new ContentFilteredError("no candidates returned");
  }

  if (candidate.finishReason && BLOCKING_FINISH_REASONS.has(candidate.finishReason)) {
    throw new ContentFilteredError(`candidate blocked (${candidate.finishReason})`);
  }

  const text = (candidate.content?.parts ?? [])
    .map((part) => part.text ?? "")
    .join("")
    .trim();

  if (!text) {
    throw new ContentFilteredError("empty response text");
  }

  return text;
}
