import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { ErrorCode, KnowledgeBaseError, getErrorMessage } from "../errors";
import type {
  ImagePayload,
  PersistedVectorIndex,
  ResetOutcome,
  SearchHit,
  StoredChunk,
  TextPayload,
  VectorEntry,
} from "../types/knowledge";
import type { EmbeddingService } from "../types/services";

const INDEX_FILE = "vector-index.json";
const DOCSTORE_DIR = "docstore";

const vectorEntrySchema = z.object({
  id: z.string().min(1),
  source: z.string(),
  page: z.number().int(),
  type: z.enum(["text", "image"]),
  embeddingText: z.string(),
  embedding: z.array(z.number()),
});

const vectorIndexSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string(),
  entries: z.array(vectorEntrySchema),
});

const docRecordSchema = z.discriminatedUnion("type", [
  z.object({
    id: z.string(),
    type: z.literal("text"),
    text: z.string(),
  }),
  z.object({
    id: z.string(),
    type: z.literal("image"),
    imageBase64: z.string(),
    summary: z.string(),
    kind: z.enum(["image", "formula"]).default("image"),
  }),
]);

type DocRecord = z.infer<typeof docRecordSchema>;

type StoreState = "closed" | "open" | "resetting";

export type KnowledgeStoreOptions = {
  rootDir: string;
  embeddings: EmbeddingService;
  /** Deletes a file or directory tree. Defaults to a recursive fs.rm. */
  removePath?: (target: string) => Promise<void>;
};

const removeRecursive = (target: string) =>
  fs.rm(target, { recursive: true, force: true });

const isMissingFile = (error: unknown) =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Vector index plus content store, bound together by chunk id.
 *
 * The index lives in memory and is persisted as one JSON file; payloads are
 * stored one file per id under docstore/. Payload files are always written
 * before the index that makes them searchable.
 */
export class KnowledgeStore {
  private entries: VectorEntry[] = [];
  private state: StoreState = "closed";
  private writeQueue: Promise<unknown> = Promise.resolve();
  private readonly removePath: (target: string) => Promise<void>;

  constructor(private readonly options: KnowledgeStoreOptions) {
    this.removePath = options.removePath ?? removeRecursive;
  }

  get isOpen(): boolean {
    return this.state === "open";
  }

  private get indexPath() {
    return path.join(this.options.rootDir, INDEX_FILE);
  }

  private get docstorePath() {
    return path.join(this.options.rootDir, DOCSTORE_DIR);
  }

  private docPath(id: string) {
    return path.join(this.docstorePath, `${id}.json`);
  }

  async open(): Promise<void> {
    if (this.state === "open") {
      return;
    }

    await fs.mkdir(this.docstorePath, { recursive: true });
    this.entries = await this.readIndex();
    this.state = "open";
    console.log(
      `Knowledge store opened at ${this.options.rootDir} (${this.entries.length} chunks)`
    );
  }

  async close(): Promise<void> {
    await this.settleWrites();
    this.entries = [];
    this.state = "closed";
  }

  async exists(source: string): Promise<boolean> {
    this.ensureOpen();
    return this.entries.some((entry) => entry.source === source);
  }

  async listSources(): Promise<string[]> {
    this.ensureOpen();
    return Array.from(
      new Set(this.entries.map((entry) => entry.source))
    ).sort();
  }

  async count(): Promise<number> {
    this.ensureOpen();
    return this.entries.length;
  }

  async put(chunks: StoredChunk[]): Promise<void> {
    this.ensureOpen();

    if (!chunks.length) {
      return;
    }

    await this.enqueueWrite(async () => {
      this.ensureOpen();

      const incomingSources = new Set(chunks.map((chunk) => chunk.source));
      const clash = this.entries.find((entry) =>
        incomingSources.has(entry.source)
      );

      if (clash) {
        throw new KnowledgeBaseError(
          ErrorCode.SOURCE_ALREADY_INDEXED,
          `Source "${clash.source}" is already indexed`
        );
      }

      const embedded: VectorEntry[] = [];

      for (const chunk of chunks) {
        embedded.push({
          id: chunk.id,
          source: chunk.source,
          page: chunk.page,
          type: chunk.type,
          embeddingText: chunk.embeddingText,
          embedding: await this.options.embeddings.embed(chunk.embeddingText),
        });
      }

      const written: string[] = [];

      try {
        for (const chunk of chunks) {
          await this.writeDoc(chunk);
          written.push(chunk.id);
        }

        const next = [...this.entries, ...embedded];
        await this.writeIndex(next);
        this.entries = next;
      } catch (error) {
        await this.discardDocs(written);
        throw error;
      }

      console.log(
        `Stored ${chunks.length} chunks for ${Array.from(incomingSources).join(", ")}`
      );
    });
  }

  async search(queryText: string, k: number): Promise<SearchHit[]> {
    this.ensureOpen();

    const snapshot = this.entries;

    if (!snapshot.length || k <= 0) {
      return [];
    }

    const queryEmbedding = await this.options.embeddings.embed(queryText);

    if (!queryEmbedding.length) {
      return [];
    }

    // Array.prototype.sort is stable, so equal scores keep insertion order
    const ranked = snapshot
      .map((entry) => ({
        entry,
        score: cosineSimilarity(queryEmbedding, entry.embedding),
      }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);

    const hits: SearchHit[] = [];

    for (const { entry, score } of ranked) {
      const chunk = await this.resolve(entry);

      if (chunk) {
        hits.push({ chunk, score });
      }
    }

    return hits;
  }

  /**
   * Deletes everything. The store is closed for the duration; when deletion
   * fails it stays closed and the caller must retry after the files are
   * released.
   */
  reset(): Promise<ResetOutcome> {
    return this.enqueueWrite(async (): Promise<ResetOutcome> => {
      this.state = "resetting";
      this.entries = [];

      try {
        await this.removePath(this.indexPath);
        await this.removePath(this.docstorePath);
      } catch (error) {
        this.state = "closed";
        const reason = getErrorMessage(error);
        console.error(`Knowledge store reset incomplete: ${reason}`);
        return { status: "manual_intervention_required", reason };
      }

      this.state = "closed";
      await this.open();
      console.log("Knowledge store reset");
      return { status: "reset" };
    });
  }

  private ensureOpen() {
    if (this.state !== "open") {
      throw new KnowledgeBaseError(
        ErrorCode.KNOWLEDGE_STORE_CLOSED,
        this.state === "resetting"
          ? "Knowledge store is being reset"
          : "Knowledge store is not open"
      );
    }
  }

  private enqueueWrite<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeQueue.then(task, task);
    this.writeQueue = run.catch(() => undefined);
    return run;
  }

  private settleWrites() {
    return this.enqueueWrite(async () => undefined);
  }

  private async resolve(entry: VectorEntry): Promise<StoredChunk | null> {
    let raw: string;

    try {
      raw = await fs.readFile(this.docPath(entry.id), "utf8");
    } catch (error) {
      console.warn(
        `Chunk ${entry.id} (${entry.source}) has no content-store entry: ${getErrorMessage(error)}`
      );
      return null;
    }

    const record = parseDocRecord(raw, entry.id);
    const base = {
      id: entry.id,
      source: entry.source,
      page: entry.page,
      embeddingText: entry.embeddingText,
    };

    if (record.type === "image") {
      const payload: ImagePayload = {
        imageBase64: record.imageBase64,
        summary: record.summary,
        kind: record.kind,
      };
      return { ...base, type: "image", payload };
    }

    const payload: TextPayload = { text: record.text };
    return { ...base, type: "text", payload };
  }

  private async writeDoc(chunk: StoredChunk) {
    const record: DocRecord =
      chunk.type === "image"
        ? { id: chunk.id, type: "image", ...chunk.payload }
        : { id: chunk.id, type: "text", text: chunk.payload.text };

    await fs.writeFile(this.docPath(chunk.id), JSON.stringify(record), "utf8");
  }

  private async discardDocs(ids: string[]) {
    for (const id of ids) {
      try {
        await fs.rm(this.docPath(id), { force: true });
      } catch (error) {
        console.warn(
          `Failed to remove orphaned payload ${id}: ${getErrorMessage(error)}`
        );
      }
    }
  }

  private async readIndex(): Promise<VectorEntry[]> {
    let raw: string;

    try {
      raw = await fs.readFile(this.indexPath, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        return [];
      }
      throw error;
    }

    let parsed: unknown;

    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new KnowledgeBaseError(
        ErrorCode.KNOWLEDGE_STORE_CORRUPT,
        `Vector index at ${this.indexPath} is not valid JSON`,
        error
      );
    }

    const result = vectorIndexSchema.safeParse(parsed);

    if (!result.success) {
      throw new KnowledgeBaseError(
        ErrorCode.KNOWLEDGE_STORE_CORRUPT,
        `Vector index at ${this.indexPath} has an unexpected shape: ${result.error.message}`
      );
    }

    return result.data.entries;
  }

  private async writeIndex(entries: VectorEntry[]) {
    const store: PersistedVectorIndex = {
      version: 1,
      updatedAt: new Date().toISOString(),
      entries,
    };
    const tempPath = `${this.indexPath}.tmp`;

    await fs.writeFile(tempPath, JSON.stringify(store), "utf8");
    await fs.rename(tempPath, this.indexPath);
  }
}

/** Unreadable payloads are read back as plain text. */
const parseDocRecord = (raw: string, id: string): DocRecord => {
  const fallback: DocRecord = { id, type: "text", text: raw };
  let parsed: unknown;

  try {
    parsed = JSON.parse(raw);
  } catch {
    console.warn(`Content-store entry ${id} is not JSON; reading it as text`);
    return fallback;
  }

  const result = docRecordSchema.safeParse(parsed);

  if (!result.success) {
    console.warn(`Content-store entry ${id} is malformed; reading it as text`);
    return fallback;
  }

  return result.data;
};

export const cosineSimilarity = (a: number[], b: number[]): number => {
  if (!a.length || !b.length || a.length !== b.length) {
    return 0;
  }

  let dot = 0;
  let magA = 0;
  let magB = 0;

  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    magA += a[i] * a[i];
    magB += b[i] * b[i];
  }

  const denominator = Math.sqrt(magA) * Math.sqrt(magB);

  return denominator === 0 ? 0 : dot / denominator;
};
