/**
 * Normalization of raw transcription output into speaker turns
 */

import {
  AssemblyAITranscript,
  Transcript,
  TranscriptSegment,
} from "../types/assemblyai";

export const MAX_SPEAKERS = 2;

/**
 * Convert a completed AssemblyAI transcript into ordered speaker turns.
 *
 * Speaker numbers are assigned by first appearance. Labels beyond
 * `maxSpeakers` are folded into the last allowed speaker, so a call never
 * reports more distinct speakers than the diarization was configured for.
 * Back-to-back utterances from the same speaker collapse into one turn.
 */
export function normalizeTranscript(
  response: AssemblyAITranscript,
  maxSpeakers: number = MAX_SPEAKERS,
): Transcript {
  const utterances = response.utterances ?? [];
  const speakerNumbers = new Map<string, number>();
  const segments: TranscriptSegment[] = [];

  const speakerFor = (label: string): number => {
    const known = speakerNumbers.get(label);
    if (known !== undefined) return known;
    const next = Math.min(speakerNumbers.size + 1, maxSpeakers);
    speakerNumbers.set(label, next);
    return next;
  };

  for (const utterance of utterances) {
    const text = utterance.text.trim();
    if (!text) continue;

    const speaker = speakerFor(utterance.speaker);
    const previous = segments[segments.length - 1];

    if (previous && previous.speaker === speaker) {
      previous.text = `${previous.text} ${text}`;
      previous.end_ms = utterance.end;
      continue;
    }

    segments.push({
      speaker,
      text,
      start_ms: utterance.start,
      end_ms: utterance.end,
    });
  }

  // Diarization can come back empty even when speech was recognized
  const plainText = response.text?.trim() ?? "";
  if (segments.length === 0 && plainText) {
    const words = response.words ?? [];
    segments.push({
      speaker: null,
      text: plainText,
      start_ms: words[0]?.start ?? 0,
      end_ms: words[words.length - 1]?.end ?? 0,
    });
  }

  const distinctSpeakers = new Set(
    segments.map((s) => s.speaker).filter((s): s is number => s !== null),
  );

  return {
    job_id: response.id,
    segments,
    speaker_count: distinctSpeakers.size,
    audio_duration_s: response.audio_duration ?? null,
  };
}

/**
 * Render turns as `Speaker N: text` lines. Unlabelled text is written as-is.
 * An empty transcript renders as the empty string.
 */
export function formatTranscript(transcript: Transcript): string {
  if (transcript.segments.length === 0) {
    return "";
  }
  return (
    transcript.segments
      .map((s) => (s.speaker === null ? s.text : `Speaker ${s.speaker}: ${s.text}`))
      .join("\n") + "\n"
  );
}
