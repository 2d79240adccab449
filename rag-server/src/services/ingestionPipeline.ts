import { randomUUID } from "node:crypto";

import {
  ErrorCode,
  KnowledgeBaseError,
  getErrorMessage,
  isKnowledgeBaseError,
} from "../errors";
import type {
  ContentUnit,
  IngestOutcome,
  StoredChunk,
} from "../types/knowledge";
import { ChunkingPolicy } from "./chunkingPolicy";
import { ContentSummarizer, toBase64 } from "./contentSummarizer";
import { KnowledgeStore } from "./knowledgeStore";

type IngestionDependencies = {
  store: KnowledgeStore;
  summarizer: ContentSummarizer;
  chunking: ChunkingPolicy;
  createId?: () => string;
};

export class IngestionPipeline {
  private readonly createId: () => string;

  constructor(private readonly deps: IngestionDependencies) {
    this.createId = deps.createId ?? randomUUID;
  }

  async ingest(source: string, units: ContentUnit[]): Promise<IngestOutcome> {
    if (await this.deps.store.exists(source)) {
      console.log(`Skipping "${source}": already in the knowledge base`);
      return { status: "already_exists" };
    }

    console.log(`Adding "${source}" (${units.length} content units)`);

    const chunks: StoredChunk[] = [];

    for (const unit of units) {
      chunks.push(...(await this.toChunks(source, unit)));
    }

    if (!chunks.length) {
      throw new KnowledgeBaseError(
        ErrorCode.EMPTY_DOCUMENT,
        `"${source}" produced no indexable content`
      );
    }

    try {
      await this.deps.store.put(chunks);
    } catch (error) {
      if (isKnowledgeBaseError(error, ErrorCode.SOURCE_ALREADY_INDEXED)) {
        return { status: "already_exists" };
      }

      throw new KnowledgeBaseError(
        ErrorCode.INGESTION_FAILED,
        `Failed to index "${source}": ${getErrorMessage(error)}`,
        error
      );
    }

    return { status: "added", chunkCount: chunks.length };
  }

  private async toChunks(
    source: string,
    unit: ContentUnit
  ): Promise<StoredChunk[]> {
    const page = unit.page > 0 ? unit.page : 1;

    if (unit.type === "text") {
      return this.deps.chunking.split(unit.content).map((text): StoredChunk => ({
        id: this.createId(),
        source,
        page,
        type: "text",
        embeddingText: text,
        payload: { text },
      }));
    }

    const formula = unit.type === "image_formula";
    const summary = formula
      ? await this.deps.summarizer.summarizeFormula(unit.content)
      : await this.deps.summarizer.summarizeImage(unit.content);

    return [
      {
        id: this.createId(),
        source,
        page,
        type: "image",
        embeddingText: summary,
        payload: {
          imageBase64: toBase64(unit.content),
          summary: formula
            ? `A formula from page ${page} is represented as: ${summary}`
            : `Summary of an image from page ${page}: ${summary}`,
          kind: formula ? "formula" : "image",
        },
      },
    ];
  }
}
