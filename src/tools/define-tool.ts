import type { z } from "zod";
import { ValidationError } from "../types/errors.js";
import type { ToolDefinition, ToolDescriptor } from "./types.js";

export function defineTool<Schema extends z.ZodTypeAny>(
  definition: ToolDefinition<Schema>,
): ToolDescriptor {
  const { name, args, handler } = definition;

  const descriptor: ToolDescriptor = {
    name,
    description: definition.description,
    inputSchema: definition.inputSchema,
    readOnly: definition.readOnly,
    destructive: definition.destructive ?? false,
    prepare(rawArgs) {
      const result = args.safeParse(rawArgs ?? {});
      if (!result.success) {
        const issue = result.error.issues[0];
        const field = issue?.path.join(".") || undefined;
        const detail = issue?.message ?? "invalid arguments";
        throw new ValidationError(
          field
            ? `Invalid argument "${field}" for ${name}: ${detail}`
            : `Invalid arguments for ${name}: ${detail}`,
          field,
        );
      }
      const parsed: z.output<Schema> = result.data;
      return (context) => handler(parsed, context);
    },
  };

  return Object.freeze(descriptor);
}
