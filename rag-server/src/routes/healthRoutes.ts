import type { Express } from "express";

import type { Env } from "../config/env";
import { KnowledgeBase } from "../knowledgeBase";

export const setupHealthRoutes = (
  app: Express,
  config: Env,
  knowledgeBase: KnowledgeBase
) => {
  app.get("/healthz", async (_req, res) => {
    try {
      const sources = await knowledgeBase.listIndexedSources();
      res.json({
        status: "ok",
        storagePath: config.storagePath,
        documents: sources.length,
        embeddings: config.embeddingModel,
        llm: config.ollamaModel,
      });
    } catch (error) {
      res.status(503).json({
        status: "degraded",
        storagePath: config.storagePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  });
};
