/**
 * Prompt construction for the sales-call coaching analysis
 */

export const EMPTY_TRANSCRIPT_MARKER =
  "[EMPTY TRANSCRIPT: no speech was recognized in the recording]";

export const PERSONA_PREAMBLE = `You are an experienced sales coach who reviews recorded calls for teams selling high-ticket digital products. You are direct, specific and constructive, and you always tie feedback to what was actually said on the call.`;

export const SALES_FRAMEWORK = `Analyze the following call transcript for flaws in the sales process. The seller's job is to move the prospect through these key stages and beliefs so that a buying decision is made on the call:

- Pain: clarify the prospect's main problem.
- Doubt: establish why they have not solved it on their own.
- Cost: surface the hidden cost of staying stuck.
- Desire: pin down their ultimate desired outcome.
- Support: assure them they will get the help they need.
- Partner indecision: ask whether partners, spouses or parents support the decision, so the prospect cannot end the call by saying they need to consult someone first.
- Trust: build confidence in the seller and the solution.

In your answer:
1. Give a concise summary of the call.
2. Identify the main topics discussed.
3. List key action items or conclusions.
4. Infer which speaker is the salesperson and which is the prospect.
5. For each stage above, say whether the seller covered it, quote the relevant part of the transcript, and explain what the seller missed or could do better.`;

export interface AnalysisPrompt {
  text: string;
  transcriptEmpty: boolean;
}

export function buildAnalysisPrompt(transcriptText: string): AnalysisPrompt {
  const body = transcriptText.trim();
  const transcriptEmpty = body.length === 0;

  return {
    text: [
      PERSONA_PREAMBLE,
      SALES_FRAMEWORK,
      `Transcript:\n${transcriptEmpty ? EMPTY_TRANSCRIPT_MARKER : body}`,
    ].join("\n\n"),
    transcriptEmpty,
  };
}
