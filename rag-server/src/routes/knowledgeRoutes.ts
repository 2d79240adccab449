import type { Express, Response } from "express";
import { z } from "zod";

import { ErrorCode, KnowledgeBaseError, getErrorMessage } from "../errors";
import { KnowledgeBase } from "../knowledgeBase";

const uploadSchema = z.object({
  filename: z.string().trim().min(1, "filename is required"),
  contentBase64: z.string().min(1, "contentBase64 is required"),
});

const querySchema = z.object({
  question: z.string().trim().min(1, "Question cannot be empty."),
  imageBase64: z.string().min(1).optional(),
});

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
  [ErrorCode.EMPTY_DOCUMENT]: 400,
  [ErrorCode.UNSUPPORTED_DOCUMENT]: 415,
  [ErrorCode.SOURCE_ALREADY_INDEXED]: 409,
  [ErrorCode.KNOWLEDGE_STORE_CLOSED]: 503,
  [ErrorCode.SERVICE_UNAVAILABLE]: 502,
  [ErrorCode.QUERY_FAILED]: 502,
};

const sendError = (res: Response, route: string, error: unknown) => {
  console.error(`${route} failed:`, error);

  if (res.headersSent) {
    return;
  }

  const status =
    error instanceof KnowledgeBaseError
      ? STATUS_BY_CODE[error.code] ?? 500
      : 500;

  res.status(status).json({
    error: getErrorMessage(error),
    code: error instanceof KnowledgeBaseError ? error.code : undefined,
  });
};

const decodeBase64 = (value: string) =>
  new Uint8Array(Buffer.from(value, "base64"));

export const setupKnowledgeRoutes = (
  app: Express,
  knowledgeBase: KnowledgeBase
) => {
  app.get("/api/documents", async (_req, res) => {
    try {
      res.json({ files: await knowledgeBase.listIndexedSources() });
    } catch (error) {
      sendError(res, "GET /api/documents", error);
    }
  });

  app.post("/api/documents", async (req, res) => {
    const parsed = uploadSchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues[0]?.message });
      return;
    }

    try {
      const { source, outcome } = await knowledgeBase.ingestFile(
        parsed.data.filename,
        decodeBase64(parsed.data.contentBase64)
      );

      if (outcome.status === "already_exists") {
        res.json({
          status: "exists",
          filename: source,
          message: "Document already exists in the knowledge base.",
        });
        return;
      }

      res.status(201).json({
        status: "success",
        filename: source,
        chunkCount: outcome.chunkCount,
        message: "Document processed and added successfully.",
      });
    } catch (error) {
      sendError(res, "POST /api/documents", error);
    }
  });

  app.post("/api/query", async (req, res) => {
    const parsed = querySchema.safeParse(req.body);

    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.issues[0]?.message });
      return;
    }

    try {
      const { question, imageBase64 } = parsed.data;
      const result = await knowledgeBase.answerQuestion(
        question,
        imageBase64 ? decodeBase64(imageBase64) : undefined
      );

      res.json({ answer: result.answer, sources: result.citedSources });
    } catch (error) {
      sendError(res, "POST /api/query", error);
    }
  });

  app.delete("/api/knowledge-base", async (_req, res) => {
    try {
      const result = await knowledgeBase.resetKnowledgeBase();
      res.status(result.status === "success" ? 200 : 409).json(result);
    } catch (error) {
      sendError(res, "DELETE /api/knowledge-base", error);
    }
  });
};
