import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";

import { getErrorMessage } from "../errors";
import { KnowledgeBase } from "../knowledgeBase";
import type { CitedSource } from "../types/knowledge";

type ToolDependencies = {
  knowledgeBase: KnowledgeBase;
};

const textResult = (...blocks: string[]): CallToolResult => ({
  content: blocks.map((text) => ({ type: "text" as const, text })),
});

const errorResult = (prefix: string, error: unknown): CallToolResult => ({
  isError: true,
  content: [{ type: "text", text: `${prefix}: ${getErrorMessage(error)}` }],
});

const formatSources = (sources: CitedSource[]) =>
  sources.length
    ? [
        "Sources:",
        ...sources.map(
          (source, index) =>
            `${index + 1}. ${source.source} (page ${source.page}, ${source.type})`
        ),
      ].join("\n")
    : "Sources: none verified";

export const registerKnowledgeTools = (
  server: McpServer,
  { knowledgeBase }: ToolDependencies
) => {
  server.registerTool(
    "ask_knowledge_base",
    {
      title: "Ask Knowledge Base",
      description:
        "Answer a question from the indexed documents and list the sources that verifiably support the answer",
      inputSchema: {
        question: z.string().min(1),
        imageBase64: z
          .string()
          .optional()
          .describe("Optional base64-encoded image that accompanies the question"),
      },
    },
    async ({ question, imageBase64 }, extra) => {
      const progressToken = extra._meta?.progressToken;
      let progressCounter = 0;

      const emitProgress = async (message: string) => {
        if (progressToken === undefined) {
          return;
        }

        progressCounter += 1;
        await extra.sendNotification({
          method: "notifications/progress",
          params: { progressToken, progress: progressCounter, message },
        });
      };

      try {
        await emitProgress("Searching the knowledge base");
        const result = await knowledgeBase.answerQuestion(
          question,
          imageBase64
            ? new Uint8Array(Buffer.from(imageBase64, "base64"))
            : undefined
        );
        await emitProgress(`Verified ${result.citedSources.length} sources`);

        return textResult(result.answer, formatSources(result.citedSources));
      } catch (error) {
        return errorResult("Failed to answer", error);
      }
    }
  );

  server.registerTool(
    "list_indexed_sources",
    {
      title: "List Indexed Sources",
      description: "List the filenames currently stored in the knowledge base",
      inputSchema: {},
    },
    async () => {
      try {
        const sources = await knowledgeBase.listIndexedSources();
        return textResult(
          sources.length ? sources.join("\n") : "No documents indexed."
        );
      } catch (error) {
        return errorResult("Failed to list sources", error);
      }
    }
  );

  server.registerTool(
    "ingest_document",
    {
      title: "Ingest Document",
      description:
        "Add a document (.txt, .md, .pdf or an image) to the knowledge base. Re-sending a known filename is a no-op.",
      inputSchema: {
        filename: z.string().min(1),
        contentBase64: z.string().min(1),
      },
    },
    async ({ filename, contentBase64 }) => {
      try {
        const { source, outcome } = await knowledgeBase.ingestFile(
          filename,
          new Uint8Array(Buffer.from(contentBase64, "base64"))
        );

        return textResult(
          outcome.status === "added"
            ? `Added "${source}" (${outcome.chunkCount} chunks).`
            : `"${source}" is already in the knowledge base.`
        );
      } catch (error) {
        return errorResult(`Failed to ingest ${filename}`, error);
      }
    }
  );

  server.registerTool(
    "reset_knowledge_base",
    {
      title: "Reset Knowledge Base",
      description:
        "Delete every indexed document. Reports when storage must be released by hand before a retry.",
      inputSchema: {},
    },
    async () => {
      try {
        const result = await knowledgeBase.resetKnowledgeBase();

        return result.status === "success"
          ? textResult(result.message)
          : { ...textResult(result.message), isError: true };
      } catch (error) {
        return errorResult("Failed to reset the knowledge base", error);
      }
    }
  );
};
