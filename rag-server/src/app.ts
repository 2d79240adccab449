import express from "express";
import cors from "cors";

import { env, type Env } from "./config/env";
import { createKnowledgeBase, KnowledgeBase } from "./knowledgeBase";
import { createMcpServer } from "./mcp/serverFactory";
import { TransportManager } from "./mcp/transportManager";
import { OllamaGateway } from "./services/ollamaGateway";
import { setupHealthRoutes } from "./routes/healthRoutes";
import { setupKnowledgeRoutes } from "./routes/knowledgeRoutes";
import { setupMcpRoutes } from "./routes/mcpRoutes";

export const buildApp = (knowledgeBase: KnowledgeBase, config: Env = env) => {
  const transportManager = new TransportManager(() =>
    createMcpServer(knowledgeBase)
  );

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: `${config.maxUploadMb}mb` }));

  setupKnowledgeRoutes(app, knowledgeBase);
  setupMcpRoutes(app, transportManager);
  setupHealthRoutes(app, config, knowledgeBase);

  return { app, transportManager };
};

export const createApp = async (config: Env = env) => {
  const ollamaGateway = new OllamaGateway({
    host: config.ollamaHost,
    llmModel: config.ollamaModel,
    embeddingModel: config.embeddingModel,
  });

  const knowledgeBase = await createKnowledgeBase({
    storagePath: config.storagePath,
    embeddings: ollamaGateway,
    generator: ollamaGateway,
    topK: config.retrievalTopK,
    chunking: {
      chunkSize: config.chunkSize,
      chunkOverlap: config.chunkOverlap,
    },
  });

  return { ...buildApp(knowledgeBase, config), knowledgeBase };
};
