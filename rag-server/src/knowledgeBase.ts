import path from "node:path";

import { AnswerSynthesizer } from "./services/answerSynthesizer";
import { ChunkingPolicy, type ChunkingOptions } from "./services/chunkingPolicy";
import { CitationVerifier } from "./services/citationVerifier";
import { ContentSummarizer } from "./services/contentSummarizer";
import { extractContentUnits } from "./services/documentExtractor";
import { IngestionPipeline } from "./services/ingestionPipeline";
import { KnowledgeStore } from "./services/knowledgeStore";
import { QueryOrchestrator } from "./services/queryOrchestrator";
import { DEFAULT_TOP_K, RetrievalEngine } from "./services/retrievalEngine";
import type {
  AnswerResult,
  ContentUnit,
  IngestOutcome,
} from "./types/knowledge";
import type { EmbeddingService, GenerationService } from "./types/services";

export type KnowledgeBaseOptions = {
  storagePath: string;
  embeddings: EmbeddingService;
  generator: GenerationService;
  topK?: number;
  chunking?: ChunkingOptions;
  removePath?: (target: string) => Promise<void>;
  createId?: () => string;
};

export type ResetStatus = "success" | "manual_intervention_required";

/**
 * The operations callers (HTTP routes, MCP tools) are allowed to use. Owns
 * the store handle; nothing else opens or closes it.
 */
export class KnowledgeBase {
  constructor(
    private readonly store: KnowledgeStore,
    private readonly ingestion: IngestionPipeline,
    private readonly query: QueryOrchestrator
  ) {}

  listIndexedSources(): Promise<string[]> {
    return this.store.listSources();
  }

  ingestDocument(source: string, units: ContentUnit[]): Promise<IngestOutcome> {
    return this.ingestion.ingest(source, units);
  }

  async ingestFile(filename: string, bytes: Uint8Array): Promise<{
    source: string;
    outcome: IngestOutcome;
  }> {
    const source = path.basename(filename);

    if (await this.store.exists(source)) {
      console.log(`Skipping "${source}": already in the knowledge base`);
      return { source, outcome: { status: "already_exists" } };
    }

    const units = await extractContentUnits(source, bytes);
    return { source, outcome: await this.ingestDocument(source, units) };
  }

  answerQuestion(question: string, image?: Uint8Array): Promise<AnswerResult> {
    return this.query.answer(question, image);
  }

  async resetKnowledgeBase(): Promise<{
    status: ResetStatus;
    message: string;
  }> {
    const outcome = await this.store.reset();

    if (outcome.status === "reset") {
      return { status: "success", message: "Knowledge base cleared." };
    }

    return {
      status: "manual_intervention_required",
      message: `Storage could not be deleted (${outcome.reason}). Restart the process holding the files, then retry the reset.`,
    };
  }

  close(): Promise<void> {
    return this.store.close();
  }
}

export const createKnowledgeBase = async (
  options: KnowledgeBaseOptions
): Promise<KnowledgeBase> => {
  const store = new KnowledgeStore({
    rootDir: options.storagePath,
    embeddings: options.embeddings,
    removePath: options.removePath,
  });
  await store.open();

  const summarizer = new ContentSummarizer(options.generator);
  const ingestion = new IngestionPipeline({
    store,
    summarizer,
    chunking: new ChunkingPolicy(options.chunking),
    createId: options.createId,
  });
  const query = new QueryOrchestrator({
    retrieval: new RetrievalEngine(store, options.topK ?? DEFAULT_TOP_K),
    synthesizer: new AnswerSynthesizer(options.generator),
    verifier: new CitationVerifier(options.generator),
    summarizer,
  });

  return new KnowledgeBase(store, ingestion, query);
};
