import type { z } from "zod";
import type { RegisteredTool, ToolMetadata } from "../types/tool.js";

/** Render zod issues as `field: problem; …` for tool error text. */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Pair a tool's metadata with a handler that only ever sees arguments parsed by the
 * tool's own input schema. Unparseable arguments come back as an `Error:` text result.
 */
export function defineTool<S extends z.AnyZodObject>(
  metadata: ToolMetadata<S>,
  handler: (args: z.output<S>) => Promise<string>,
): RegisteredTool {
  return {
    metadata,
    execute: async (args) => {
      const parsed = metadata.inputSchema.safeParse(args);
      if (!parsed.success) {
        return `Error: Invalid arguments: ${describeIssues(parsed.error)}`;
      }
      return handler(parsed.data);
    },
  };
}
