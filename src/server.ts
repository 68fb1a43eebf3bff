import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import axios, { type AxiosInstance } from "axios";
import { SsoTokenManager, createTokenCache } from "./auth/sso-token-manager.js";
import { serverInfo } from "./config/server-config.js";
import { InventoryClient } from "./services/inventory-client.js";
import { createToolRegistry, type ToolRegistry } from "./tools/index.js";
import type { ServerConfig, TransportMetadata } from "./types/session.js";

export interface ServerServices {
  tokens: SsoTokenManager;
  client: InventoryClient;
  registry: ToolRegistry;
}

export function createHttpClient(): AxiosInstance {
  return axios.create({
    headers: {
      "User-Agent": `${serverInfo.name}/${serverInfo.version}`,
      Accept: "application/json",
    },
  });
}

/**
 * Process-wide services. The token cache inside `tokens` is the only state
 * shared between connections.
 */
export function createServices(
  config: ServerConfig,
  http: AxiosInstance = createHttpClient(),
): ServerServices {
  const tokens = new SsoTokenManager(config, http, createTokenCache(config));
  const client = new InventoryClient(config, tokens, http);
  const registry = createToolRegistry({
    client,
    defaultOfflineToken: config.defaultOfflineToken,
    allowOnlyNonDestructive: config.tools.allowOnlyNonDestructive,
  });
  return { tokens, client, registry };
}

/**
 * One MCP server per connection. `metadata` carries whatever the transport
 * knows about the caller and is consulted on every tool call.
 */
export function createServer(
  services: ServerServices,
  metadata: TransportMetadata = {},
): Server {
  const server = new Server(
    {
      name: serverInfo.name,
      version: serverInfo.version,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: services.registry.listDefinitions(),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: input } = request.params;
    return services.registry.dispatch(name, input ?? {}, metadata);
  });

  return server;
}
