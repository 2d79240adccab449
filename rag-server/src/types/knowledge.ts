export type ContentUnit =
  | {
      type: "text";
      content: string;
      page: number;
      source: string;
    }
  | {
      type: "image" | "image_formula";
      content: Uint8Array;
      page: number;
      source: string;
    };

export type TextPayload = {
  text: string;
};

export type ImagePayload = {
  imageBase64: string;
  summary: string;
  kind: "image" | "formula";
};

type ChunkBase = {
  id: string;
  source: string;
  page: number;
  embeddingText: string;
};

export type TextChunk = ChunkBase & {
  type: "text";
  payload: TextPayload;
};

export type ImageChunk = ChunkBase & {
  type: "image";
  payload: ImagePayload;
};

export type StoredChunk = TextChunk | ImageChunk;

export type ChunkType = StoredChunk["type"];

/** One row of the persisted vector index. */
export type VectorEntry = {
  id: string;
  source: string;
  page: number;
  type: ChunkType;
  embeddingText: string;
  embedding: number[];
};

export type PersistedVectorIndex = {
  version: 1;
  updatedAt: string;
  entries: VectorEntry[];
};

export type SearchHit = {
  chunk: StoredChunk;
  score: number;
};

export type RetrievalOutcome =
  | { status: "found"; results: StoredChunk[] }
  | { status: "no_matches" }
  | { status: "service_error"; reason: string };

export type IngestOutcome =
  | { status: "added"; chunkCount: number }
  | { status: "already_exists" };

export type ResetOutcome =
  | { status: "reset" }
  | { status: "manual_intervention_required"; reason: string };

export type CitedSource = {
  source: string;
  page: number;
  summary: string;
  type: ChunkType;
  imageBase64?: string;
};

export type AnswerResult = {
  answer: string;
  citedSources: CitedSource[];
};
