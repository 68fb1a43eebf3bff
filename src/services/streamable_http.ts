import type { Server as HttpServer } from "node:http";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import express, { type Request, type Response } from "express";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import type { TransportMetadata } from "../types/session.js";
import { errorMessage, getLogger } from "../utils/logger.js";

const httpLogger = getLogger("http-server");

export interface StreamableHttpOptions {
  host: string;
  port: number;
}

function methodNotAllowed(req: Request, res: Response): void {
  httpLogger.debug("Received MCP request with unsupported method", {
    method: req.method,
    url: req.url,
  });
  res.writeHead(405).end(
    JSON.stringify({
      jsonrpc: "2.0",
      error: {
        code: -32000,
        message: "Method not allowed.",
      },
      id: null,
    }),
  );
}

export function createStreamableHttpApp(
  getServer: (metadata: TransportMetadata) => Server,
): express.Express {
  const app = express();
  app.use(express.json());

  app.post("/mcp", async (req: Request, res: Response) => {
    try {
      // Stateless: each request gets its own server bound to its headers.
      const server = getServer({ headers: req.headers });
      const transport: StreamableHTTPServerTransport =
        new StreamableHTTPServerTransport({
          sessionIdGenerator: undefined,
        });
      res.on("close", () => {
        httpLogger.debug("HTTP request closed");
        transport.close().catch((error: unknown) => {
          httpLogger.warn("Failed to close transport", {
            error: errorMessage(error),
          });
        });
        server.close().catch((error: unknown) => {
          httpLogger.warn("Failed to close server", {
            error: errorMessage(error),
          });
        });
      });
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      httpLogger.error("Error handling MCP request", {
        error: errorMessage(error),
        url: req.url,
        method: req.method,
      });
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: {
            code: -32603,
            message: "Internal server error",
          },
          id: null,
        });
      }
    }
  });

  app.get("/mcp", methodNotAllowed);
  app.delete("/mcp", methodNotAllowed);

  return app;
}

export function startStreamableHTTPServer(
  getServer: (metadata: TransportMetadata) => Server,
  options: StreamableHttpOptions,
): HttpServer {
  const app = createStreamableHttpApp(getServer);
  const listener = app.listen(options.port, options.host, () => {
    httpLogger.info("MCP Streamable HTTP Server listening", {
      host: options.host,
      port: options.port,
    });
  });
  return listener;
}
