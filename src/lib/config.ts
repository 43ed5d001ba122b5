/**
 * Environment configuration
 *
 * Read once at process start. A missing required value is fatal: the server
 * refuses to boot rather than failing on the first uploaded video.
 */

import os from "os";
import { ConfigError } from "./errors";
import { isNonEmptyString, parsePositiveInt } from "./guards";

export interface AppConfig {
  aws: {
    region: string;
    credentials?: { accessKeyId: string; secretAccessKey: string };
  };
  inputBucket: string | null;
  outputBucket: string;
  transcription: {
    apiKey: string;
    languageCode: string;
    pollIntervalMs: number;
    timeoutMs: number;
  };
  generation: {
    apiKey: string;
    model: string;
  };
  extraction: {
    ffmpegPath: string;
    timeoutMs: number;
  };
  scratchDir: string;
  server: {
    port: number;
    bodyLimit: string;
    // Shared secret for /webhooks/s3; the route is not mounted without one
    webhookSecret: string | null;
  };
}

export const DEFAULT_GEMINI_MODEL = "gemini-2.5-pro";
export const DEFAULT_LANGUAGE_CODE = "en";

const REQUIRED = ["ASSEMBLYAI_API_KEY", "GEMINI_API_KEY", "OUTPUT_BUCKET"] as const;

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const missing = REQUIRED.filter((name) => !isNonEmptyString(env[name]));
  const invalid: string[] = [];

  const int = (name: string, fallback: number): number => {
    const raw = env[name];
    if (!isNonEmptyString(raw)) return fallback;
    const parsed = parsePositiveInt(raw);
    if (parsed === null) {
      invalid.push(name);
      return fallback;
    }
    return parsed;
  };

  const str = (name: string, fallback: string): string => {
    const raw = env[name];
    return isNonEmptyString(raw) ? raw.trim() : fallback;
  };

  const pollIntervalMs = int("TRANSCRIPTION_POLL_INTERVAL_MS", 5000);
  const transcriptionTimeoutMs = int("TRANSCRIPTION_TIMEOUT_MS", 600_000);
  const extractionTimeoutMs = int("EXTRACTION_TIMEOUT_MS", 8 * 60 * 1000);
  const port = int("PORT", 3000);

  if (missing.length > 0 || invalid.length > 0) {
    throw new ConfigError([...missing], invalid);
  }

  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;

  return {
    aws: {
      region: str("AWS_REGION", "us-east-1"),
      // Otherwise the SDK default chain (instance roles, profiles) applies
      credentials:
        isNonEmptyString(accessKeyId) && isNonEmptyString(secretAccessKey)
          ? { accessKeyId, secretAccessKey }
          : undefined,
    },
    inputBucket: isNonEmptyString(env.INPUT_BUCKET)
      ? env.INPUT_BUCKET.trim()
      : null,
    outputBucket: str("OUTPUT_BUCKET", ""),
    transcription: {
      apiKey: str("ASSEMBLYAI_API_KEY", ""),
      languageCode: str("TRANSCRIPTION_LANGUAGE", DEFAULT_LANGUAGE_CODE),
      pollIntervalMs,
      timeoutMs: transcriptionTimeoutMs,
    },
    generation: {
      apiKey: str("GEMINI_API_KEY", ""),
      model: str("GEMINI_MODEL", DEFAULT_GEMINI_MODEL),
    },
    extraction: {
      ffmpegPath: str("FFMPEG_PATH", "ffmpeg"),
      timeoutMs: extractionTimeoutMs,
    },
    scratchDir: str("SCRATCH_DIR", os.tmpdir()),
    server: {
      port,
      bodyLimit: str("EXPRESS_BODY_LIMIT", "10mb"),
      webhookSecret: isNonEmptyString(env.WEBHOOK_SECRET)
        ? env.WEBHOOK_SECRET.trim()
        : null,
    },
  };
}
