import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import { registerKnowledgeTools } from "../controllers/toolController";
import { KnowledgeBase } from "../knowledgeBase";

/** A protocol server connects to a single transport, so one per session. */
export const createMcpServer = (knowledgeBase: KnowledgeBase) => {
  const server = new McpServer(
    {
      name: "document-knowledge-base",
      version: "0.1.0",
      title: "Document Knowledge Base",
    },
    {
      capabilities: {
        tools: { listChanged: true },
        logging: {},
      },
    }
  );

  registerKnowledgeTools(server, { knowledgeBase });

  return server;
};
