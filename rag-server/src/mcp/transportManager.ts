import { randomUUID } from "node:crypto";
import type { Request } from "express";

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";

import { getErrorMessage } from "../errors";

type Session = {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
};

export class TransportManager {
  private sessions = new Map<string, Session>();

  constructor(private readonly createServer: () => McpServer) {}

  private async openSession(): Promise<StreamableHTTPServerTransport> {
    const server = this.createServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId) => {
        this.sessions.set(sessionId, { server, transport });
        console.log(`Session initialized: ${sessionId}`);
      },
      onsessionclosed: (sessionId) => {
        void this.release(sessionId);
      },
    });

    transport.onclose = () => {
      const sid = transport.sessionId;

      if (sid) {
        void this.release(sid);
      }
    };

    await server.connect(transport);
    return transport;
  }

  private async release(sessionId: string) {
    const session = this.sessions.get(sessionId);

    if (!session) {
      return;
    }

    this.sessions.delete(sessionId);
    console.log(`Session closed: ${sessionId}`);

    try {
      await session.server.close();
    } catch (error) {
      console.warn(
        `Failed to close MCP server for ${sessionId}: ${getErrorMessage(error)}`
      );
    }
  }

  async ensureTransport(
    req: Request
  ): Promise<StreamableHTTPServerTransport | null> {
    const sessionId = req.header("mcp-session-id");

    if (sessionId) {
      return this.sessions.get(sessionId)?.transport ?? null;
    }

    if (isInitializeRequest(req.body)) {
      return this.openSession();
    }

    return null;
  }

  get(sessionId: string) {
    return this.sessions.get(sessionId)?.transport;
  }

  get size() {
    return this.sessions.size;
  }

  async closeAll() {
    await Promise.all(
      Array.from(this.sessions.keys()).map((sessionId) =>
        this.release(sessionId)
      )
    );
  }
}
