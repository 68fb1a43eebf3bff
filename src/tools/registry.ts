import {
  ErrorCode,
  McpError,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { resolveSession } from "../auth/session-context.js";
import type { InventoryClient } from "../services/inventory-client.js";
import { ServiceError, ServiceErrorCode } from "../types/errors.js";
import type { TransportMetadata } from "../types/session.js";
import { getLogger } from "../utils/logger.js";
import type { ToolDescriptor } from "./types.js";

const logger = getLogger("tool-registry");

export interface ToolRegistryOptions {
  client: InventoryClient;
  defaultOfflineToken?: string;
  allowOnlyNonDestructive?: boolean;
}

export function createTextResult(data: unknown): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(data, null, 2) }],
  };
}

export function createErrorResult(
  code: ServiceErrorCode,
  message: string,
): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify({ error: { code, message } }, null, 2),
      },
    ],
    isError: true,
  };
}

export class ToolRegistry {
  private tools: Map<string, ToolDescriptor> = new Map();
  private sealed = false;
  private options: ToolRegistryOptions;

  constructor(options: ToolRegistryOptions) {
    this.options = options;
  }

  register(descriptor: ToolDescriptor): this {
    if (this.sealed) {
      throw new Error(
        `Cannot register ${descriptor.name}: tool registry is sealed`,
      );
    }
    if (this.tools.has(descriptor.name)) {
      throw new Error(`Tool ${descriptor.name} is already registered`);
    }
    this.tools.set(descriptor.name, descriptor);
    return this;
  }

  seal(): this {
    this.sealed = true;
    return this;
  }

  get(name: string): ToolDescriptor | undefined {
    const descriptor = this.tools.get(name);
    if (!descriptor) {
      return undefined;
    }
    // Mutating tools are hidden entirely in non-destructive mode.
    if (this.options.allowOnlyNonDestructive && !descriptor.readOnly) {
      return undefined;
    }
    return descriptor;
  }

  list(): ToolDescriptor[] {
    return [...this.tools.values()].filter(
      (descriptor) => this.get(descriptor.name) !== undefined,
    );
  }

  listDefinitions(): Tool[] {
    return this.list().map((descriptor) => ({
      name: descriptor.name,
      description: descriptor.description,
      inputSchema: descriptor.inputSchema,
      annotations: {
        readOnlyHint: descriptor.readOnly,
        destructiveHint: descriptor.destructive,
      },
    }));
  }

  async dispatch(
    name: string,
    rawArgs: unknown,
    metadata: TransportMetadata,
  ): Promise<CallToolResult> {
    const descriptor = this.get(name);
    if (!descriptor) {
      throw new McpError(ErrorCode.InvalidRequest, `Unknown tool: ${name}`);
    }

    const startedAt = Date.now();
    try {
      const invoke = descriptor.prepare(rawArgs);
      const session = resolveSession(
        metadata,
        this.options.defaultOfflineToken,
      );
      const result = await invoke({ client: this.options.client, session });

      logger.info("Tool invocation succeeded", {
        tool: name,
        source: session.source,
        durationMs: Date.now() - startedAt,
      });
      return createTextResult(result);
    } catch (error) {
      if (error instanceof ServiceError) {
        logger.warn("Tool invocation failed", {
          tool: name,
          code: error.code,
          error: error.message,
          durationMs: Date.now() - startedAt,
        });
        return createErrorResult(error.code, error.toPublicMessage());
      }

      logger.error("Unexpected error during tool invocation", {
        tool: name,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      return createErrorResult(
        ServiceErrorCode.INTERNAL_ERROR,
        `Tool ${name} failed unexpectedly`,
      );
    }
  }
}
