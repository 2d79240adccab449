import type { StoredChunk } from "../types/knowledge";
import type { GenerationService } from "../types/services";
import { toBase64 } from "./contentSummarizer";

const CONTEXT_SEPARATOR = "\n\n---\n\n";

export const displayText = (chunk: StoredChunk) =>
  chunk.type === "image" ? chunk.payload.summary : chunk.payload.text;

export const buildAnswerPrompt = (question: string, context: StoredChunk[]) =>
  [
    "**Your Role**: You are a document analysis assistant.",
    '**Task**: Based ONLY on the "Context Information" below, answer the "User\'s Question". If the context does not contain the answer, say so.',
    "---",
    "**Context Information**:",
    context.map(displayText).join(CONTEXT_SEPARATOR),
    "---",
    "**User's Question**:",
    question,
    "---",
    "**Your Answer**:",
  ].join("\n");

export class AnswerSynthesizer {
  constructor(
    private readonly generator: GenerationService,
    private readonly temperature = 0.1
  ) {}

  /**
   * `searchQuery` only drives retrieval; the model is shown the question as
   * the user asked it.
   */
  async synthesize(
    question: string,
    context: StoredChunk[],
    searchQuery: string,
    image?: Uint8Array
  ): Promise<string> {
    if (!context.length) {
      console.log("No context retrieved; answering without grounding");
      return this.generator.generate({
        prompt: question,
        images: image ? [toBase64(image)] : undefined,
        temperature: this.temperature,
      });
    }

    console.log(
      `Generating grounded answer from ${context.length} chunks (search query: ${searchQuery.slice(0, 80)})`
    );

    return this.generator.generate({
      prompt: buildAnswerPrompt(question, context),
      temperature: this.temperature,
    });
  }
}
