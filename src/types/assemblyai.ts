/**
 * TypeScript types for AssemblyAI API responses and normalized transcripts
 */

// AssemblyAI API Request Parameters
export interface AssemblyAITranscriptRequest {
  audio_url: string;
  language_code: string;
  punctuate: boolean;
  format_text: boolean;
  speaker_labels: boolean;
  speaker_options?: {
    min_speakers_expected: number;
    max_speakers_expected: number;
  };
}

export type AssemblyAITranscriptStatus =
  | "queued"
  | "processing"
  | "completed"
  | "error";

// AssemblyAI API Response Types
export interface AssemblyAIWord {
  text: string;
  start: number;
  end: number;
  confidence: number;
  speaker?: string | null;
}

export interface AssemblyAIUtterance {
  speaker: string;
  text: string;
  start: number;
  end: number;
  confidence: number;
  words?: AssemblyAIWord[];
}

export interface AssemblyAITranscript {
  id: string;
  status: AssemblyAITranscriptStatus;
  text?: string | null;
  utterances?: AssemblyAIUtterance[] | null;
  words?: AssemblyAIWord[] | null;
  audio_duration?: number | null;
  language_code?: string;
  error?: string;
}

// Normalized output types
export interface TranscriptSegment {
  speaker: number | null; // 1-based; null when the service returned no labels
  text: string;
  start_ms: number;
  end_ms: number;
}

export interface Transcript {
  job_id: string;
  segments: TranscriptSegment[];
  speaker_count: number;
  audio_duration_s: number | null;
}
