import "dotenv/config";
import path from "node:path";

const resolvePath = (value: string | undefined, fallback: string) =>
  path.resolve(value ?? fallback);

const readNumber = (value: string | undefined, fallback: number) => {
  const parsed = Number(value ?? fallback);
  return Number.isFinite(parsed) ? parsed : fallback;
};

export const env = {
  port: readNumber(process.env.PORT, 8000),
  storagePath: resolvePath(
    process.env.STORAGE_PATH,
    path.join(process.cwd(), "storage")
  ),
  ollamaHost: process.env.OLLAMA_HOST ?? "http://127.0.0.1:11434",
  ollamaModel: process.env.OLLAMA_MODEL ?? "qwen2.5vl:7b",
  embeddingModel: process.env.EMBEDDING_MODEL ?? "qwen3-embedding:4b",
  retrievalTopK: readNumber(process.env.RETRIEVAL_TOP_K, 10),
  chunkSize: readNumber(process.env.CHUNK_SIZE, 1000),
  chunkOverlap: readNumber(process.env.CHUNK_OVERLAP, 200),
  maxUploadMb: readNumber(process.env.MAX_UPLOAD_MB, 25),
};

export type Env = typeof env;
