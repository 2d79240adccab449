import type { Express, Request, Response } from "express";

import { TransportManager } from "../mcp/transportManager";

const JSON_RPC_ERROR = {
  invalidSession: {
    status: 400,
    payload: {
      jsonrpc: "2.0",
      error: { code: -32000, message: "Invalid session. Initialize first." },
      id: null,
    },
  },
  internal: {
    status: 500,
    payload: {
      jsonrpc: "2.0",
      error: { code: -32603, message: "Internal server error" },
      id: null,
    },
  },
};

export const MCP_PATH = "/mcp";

export const setupMcpRoutes = (
  app: Express,
  transportManager: TransportManager
) => {
  // POST may open a session; GET (event stream) and DELETE need an existing one
  const handle = async (req: Request, res: Response) => {
    try {
      const transport =
        req.method === "POST"
          ? await transportManager.ensureTransport(req)
          : transportManager.get(req.header("mcp-session-id") ?? "");

      if (!transport) {
        res
          .status(JSON_RPC_ERROR.invalidSession.status)
          .json(JSON_RPC_ERROR.invalidSession.payload);
        return;
      }

      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      console.error(`${req.method} ${MCP_PATH} failed:`, error);

      if (!res.headersSent) {
        res
          .status(JSON_RPC_ERROR.internal.status)
          .json(JSON_RPC_ERROR.internal.payload);
      }
    }
  };

  app.post(MCP_PATH, handle);
  app.get(MCP_PATH, handle);
  app.delete(MCP_PATH, handle);
};
