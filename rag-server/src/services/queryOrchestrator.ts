import { ErrorCode, KnowledgeBaseError, getErrorMessage } from "../errors";
import type {
  AnswerResult,
  CitedSource,
  StoredChunk,
} from "../types/knowledge";
import { AnswerSynthesizer, displayText } from "./answerSynthesizer";
import { CitationVerifier } from "./citationVerifier";
import { ContentSummarizer } from "./contentSummarizer";
import { RetrievalEngine } from "./retrievalEngine";

type QueryDependencies = {
  retrieval: RetrievalEngine;
  synthesizer: AnswerSynthesizer;
  verifier: CitationVerifier;
  summarizer: ContentSummarizer;
};

export const buildSearchQuery = (question: string, imageDescription: string) =>
  imageDescription.trim()
    ? `${question}\n\n[Information from uploaded image]:\n${imageDescription}`
    : question;

export const toCitedSource = (chunk: StoredChunk): CitedSource =>
  chunk.type === "image"
    ? {
        source: chunk.source,
        page: chunk.page,
        summary: displayText(chunk),
        type: "image",
        imageBase64: chunk.payload.imageBase64,
      }
    : {
        source: chunk.source,
        page: chunk.page,
        summary: displayText(chunk),
        type: "text",
      };

export class QueryOrchestrator {
  constructor(private readonly deps: QueryDependencies) {}

  async answer(question: string, image?: Uint8Array): Promise<AnswerResult> {
    let searchQuery = question;

    if (image) {
      const description = await this.deps.summarizer.describeQueryImage(image);
      searchQuery = buildSearchQuery(question, description);
    }

    const retrieval = await this.deps.retrieval.retrieve(searchQuery);

    if (retrieval.status === "service_error") {
      throw new KnowledgeBaseError(
        ErrorCode.QUERY_FAILED,
        `Could not search the knowledge base: ${retrieval.reason}`
      );
    }

    const context = retrieval.status === "found" ? retrieval.results : [];
    let answer: string;

    try {
      answer = await this.deps.synthesizer.synthesize(
        question,
        context,
        searchQuery,
        image
      );
    } catch (error) {
      throw new KnowledgeBaseError(
        ErrorCode.SERVICE_UNAVAILABLE,
        `Answer generation failed: ${getErrorMessage(error)}`,
        error
      );
    }

    if (!context.length) {
      return { answer, citedSources: [] };
    }

    const cited = await this.deps.verifier.verify(answer, context);
    console.log(`Verified ${cited.length} of ${context.length} sources`);

    return {
      answer,
      citedSources: cited.map((index) => toCitedSource(context[index])),
    };
  }
}
