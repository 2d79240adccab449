import "dotenv/config";

export type ClientConfig = {
  baseUrl: string;
  mcpUrl: string;
  clientName: string;
  clientVersion: string;
  requestTimeoutMs: number;
};

const DEFAULT_BASE_URL = "http://127.0.0.1:8000";
const DEFAULT_MCP_PATH = "/mcp";
const DEFAULT_CLIENT_NAME = "document-knowledge-base-cli";
const DEFAULT_CLIENT_VERSION = "0.1.0";
const DEFAULT_TIMEOUT_MS = 10 * 60 * 1000; // ingestion of large PDFs is slow

export const normalizePath = (value: string) => {
  if (!value.trim()) {
    return "/";
  }
  return value.startsWith("/") ? value : `/${value}`;
};

export const loadConfig = (
  source: Record<string, string | undefined> = process.env
): ClientConfig => {
  const base = (source.RAG_SERVER_BASE_URL ?? DEFAULT_BASE_URL).trim();
  const mcpPath = normalizePath(source.RAG_MCP_PATH ?? DEFAULT_MCP_PATH);

  const baseUrl = new URL(base);
  const mcpUrl = new URL(mcpPath, baseUrl);

  const requestTimeoutMs = Number(
    source.RAG_REQUEST_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS
  );

  return {
    baseUrl: baseUrl.toString().replace(/\/$/, ""),
    mcpUrl: mcpUrl.toString(),
    clientName: source.RAG_CLIENT_NAME ?? DEFAULT_CLIENT_NAME,
    clientVersion: source.RAG_CLIENT_VERSION ?? DEFAULT_CLIENT_VERSION,
    requestTimeoutMs: Number.isFinite(requestTimeoutMs)
      ? requestTimeoutMs
      : DEFAULT_TIMEOUT_MS,
  };
};
