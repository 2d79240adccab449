import { getErrorMessage } from "../errors";
import type { RetrievalOutcome, StoredChunk } from "../types/knowledge";
import { KnowledgeStore } from "./knowledgeStore";

export const DEFAULT_TOP_K = 10;

export class RetrievalEngine {
  constructor(
    private readonly store: KnowledgeStore,
    private readonly defaultTopK = DEFAULT_TOP_K
  ) {}

  async retrieve(
    queryText: string,
    k = this.defaultTopK
  ): Promise<RetrievalOutcome> {
    let results: StoredChunk[];

    try {
      const hits = await this.store.search(queryText, k);
      results = dedupeByContent(hits.map((hit) => hit.chunk));
    } catch (error) {
      const reason = getErrorMessage(error);
      console.warn(`Retrieval failed: ${reason}`);
      return { status: "service_error", reason };
    }

    console.log(`Retrieved ${results.length} unique chunks`);

    return results.length
      ? { status: "found", results }
      : { status: "no_matches" };
  }
}

/** First occurrence wins; order is preserved. */
export const dedupeByContent = (chunks: StoredChunk[]): StoredChunk[] => {
  const seen = new Set<string>();

  return chunks.filter((chunk) => {
    const key = chunk.embeddingText.trim();

    if (seen.has(key)) {
      return false;
    }

    seen.add(key);
    return true;
  });
};
