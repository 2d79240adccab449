export { createApp, buildApp } from "./app";
export { env, type Env } from "./config/env";
export { ErrorCode, KnowledgeBaseError } from "./errors";
export {
  createKnowledgeBase,
  KnowledgeBase,
  type KnowledgeBaseOptions,
  type ResetStatus,
} from "./knowledgeBase";
export { OllamaGateway } from "./services/ollamaGateway";
export type * from "./types/knowledge";
export type * from "./types/services";
