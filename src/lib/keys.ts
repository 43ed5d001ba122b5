/**
 * Deterministic storage keys for pipeline artifacts
 * Single source of truth for output paths
 *
 * Keys depend only on the input object key, so a redelivered trigger
 * overwrites the same three objects instead of creating new ones.
 */

import path from "path";

export const OUTPUT_PREFIXES = ["audio/", "transcripts/", "analysis/"] as const;

export interface ArtifactKeys {
  audio: string;
  transcript: string;
  analysis: string;
}

/**
 * Object key without its final extension. Directories are kept so that
 * `team-a/call1.mp4` and `team-b/call1.mp4` stay apart.
 */
export function stemOf(objectKey: string): string {
  const normalized = objectKey.replace(/\\/g, "/").replace(/^\/+/, "");
  if (!normalized || normalized.endsWith("/")) {
    throw new Error(`Object key does not name a file: "${objectKey}"`);
  }
  const ext = path.posix.extname(normalized);
  return ext ? normalized.slice(0, -ext.length) : normalized;
}

export const keys = {
  audio: (stem: string) => `audio/${stem}.flac`,
  transcript: (stem: string) => `transcripts/${stem}_transcript.txt`,
  analysis: (stem: string) => `analysis/${stem}_analysis.txt`,
} as const;

export function artifactKeysFor(objectKey: string): ArtifactKeys {
  const stem = stemOf(objectKey);
  return {
    audio: keys.audio(stem),
    transcript: keys.transcript(stem),
    analysis: keys.analysis(stem),
  };
}

export function isOutputKey(objectKey: string): boolean {
  return OUTPUT_PREFIXES.some((prefix) => objectKey.startsWith(prefix));
}
