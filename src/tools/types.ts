import type { z } from "zod";
import type { InventoryClient } from "../services/inventory-client.js";
import type { SessionContext } from "../types/session.js";

export interface JsonSchemaProperty {
  type: "string" | "boolean";
  description: string;
  enum?: string[];
}

export type ToolInputSchema = {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required?: string[];
};

export interface ToolContext {
  client: InventoryClient;
  session: SessionContext;
}

export type ToolHandler<Args> = (
  args: Args,
  context: ToolContext,
) => Promise<unknown>;

export interface ToolDefinition<Schema extends z.ZodTypeAny> {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  args: Schema;
  readOnly: boolean;
  destructive?: boolean;
  handler: ToolHandler<z.output<Schema>>;
}

/**
 * A registered tool with its argument type erased: `prepare` validates raw
 * arguments and returns the bound invocation.
 */
export interface ToolDescriptor {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: ToolInputSchema;
  readonly readOnly: boolean;
  readonly destructive: boolean;
  prepare(rawArgs: unknown): (context: ToolContext) => Promise<unknown>;
}
