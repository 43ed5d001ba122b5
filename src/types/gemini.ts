/**
 * TypeScript types for the Gemini generateContent REST API
 */

export interface GeminiPart {
  text?: string;
}

export interface GeminiContent {
  role?: "user" | "model";
  parts?: GeminiPart[];
}

export interface GeminiGenerateRequest {
  contents: GeminiContent[];
}

export interface GeminiSafetyRating {
  category: string;
  probability: string;
  blocked?: boolean;
}

export interface GeminiCandidate {
  content?: GeminiContent;
  finishReason?: string;
  safetyRatings?: GeminiSafetyRating[];
}

export interface GeminiGenerateResponse {
  candidates?: GeminiCandidate[];
  promptFeedback?: {
    blockReason?: string;
    safetyRatings?: GeminiSafetyRating[];
  };
  usageMetadata?: {
    promptTokenCount?: number;
    candidatesTokenCount?: number;
    totalTokenCount?: number;
  };
  modelVersion?: string;
}
