#!/usr/bin/env node
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadServerConfig, serverInfo } from "./config/server-config.js";
import { createServer, createServices } from "./server.js";
import { startStreamableHTTPServer } from "./services/streamable_http.js";
import { errorMessage, getLogger } from "./utils/logger.js";

const serverLogger = getLogger("mcp-server");

async function main(): Promise<void> {
  const config = loadServerConfig();
  const services = createServices(config);

  if (config.http.enabled) {
    const listener = startStreamableHTTPServer(
      (metadata) => createServer(services, metadata),
      { host: config.http.host, port: config.http.port },
    );
    serverLogger.info("Streamable HTTP server started", {
      version: serverInfo.version,
      tools: services.registry.list().length,
    });

    ["SIGINT", "SIGTERM"].forEach((signal) => {
      process.on(signal, () => {
        serverLogger.info("Received shutdown signal", { signal });
        listener.close(() => process.exit(0));
      });
    });
    return;
  }

  const server = createServer(services);
  const transport = new StdioServerTransport();

  serverLogger.info("Starting Assisted Installer MCP server", {
    version: serverInfo.version,
    transport: "stdio",
    defaultCredential: config.defaultOfflineToken ? "environment" : "none",
  });

  await server.connect(transport);

  ["SIGINT", "SIGTERM"].forEach((signal) => {
    process.on(signal, () => {
      serverLogger.info("Received shutdown signal, closing server", { signal });
      server
        .close()
        .catch((error: unknown) => {
          serverLogger.error("Error while closing server", {
            error: errorMessage(error),
          });
        })
        .finally(() => process.exit(0));
    });
  });
}

main().catch((error: unknown) => {
  serverLogger.error("Failed to start server", { error: errorMessage(error) });
  process.exit(1);
});
