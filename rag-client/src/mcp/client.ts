import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { RequestOptions } from "@modelcontextprotocol/sdk/shared/protocol.js";

import { loadConfig, type ClientConfig } from "../config/env";

export class KnowledgeBaseClient {
  private readonly config: ClientConfig;
  private readonly client: Client;
  private transport?: StreamableHTTPClientTransport;
  private connected = false;

  constructor(config: ClientConfig = loadConfig()) {
    this.config = config;
    this.client = new Client(
      {
        name: this.config.clientName,
        version: this.config.clientVersion,
      },
      {
        enforceStrictCapabilities: false,
      }
    );
  }

  private async ensureConnected() {
    if (this.connected) {
      return;
    }

    const transport = new StreamableHTTPClientTransport(
      new URL(this.config.mcpUrl)
    );

    transport.onerror = (error: Error) => {
      if (error.name === "AbortError") {
        return;
      }
      console.error("[transport]", error.message);
    };

    try {
      await this.client.connect(transport);
      this.transport = transport;
      this.connected = true;
    } catch (error) {
      await transport.close().catch((closeError: unknown) => {
        console.error("[transport] close after failed connect:", closeError);
      });

      const message =
        error instanceof Error ? error.message : JSON.stringify(error);

      throw new Error(
        `Failed to connect to the knowledge base at ${this.config.mcpUrl}. ` +
          `Is the server running? Set RAG_SERVER_BASE_URL if it uses a different origin.\n` +
          `Underlying error: ${message}`
      );
    }
  }

  private async callTool(
    name: string,
    args: Record<string, unknown>,
    options?: RequestOptions
  ) {
    await this.ensureConnected();
    return this.client.callTool({ name, arguments: args }, undefined, {
      timeout: this.config.requestTimeoutMs,
      ...options,
    });
  }

  async listTools() {
    await this.ensureConnected();
    return this.client.listTools();
  }

  listSources() {
    return this.callTool("list_indexed_sources", {});
  }

  ingest(filename: string, content: Uint8Array) {
    return this.callTool("ingest_document", {
      filename,
      contentBase64: Buffer.from(content).toString("base64"),
    });
  }

  ask(question: string, image?: Uint8Array, options?: RequestOptions) {
    return this.callTool(
      "ask_knowledge_base",
      image
        ? { question, imageBase64: Buffer.from(image).toString("base64") }
        : { question },
      options
    );
  }

  reset() {
    return this.callTool("reset_knowledge_base", {});
  }

  async close() {
    if (this.transport) {
      await this.transport.close();
      this.transport = undefined;
    }
    if (this.connected) {
      await this.client.close();
      this.connected = false;
    }
  }
}
