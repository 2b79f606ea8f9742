import type { z } from "zod";

/** Metadata declared by every tool; the schema both parses arguments and is advertised to clients. */
export interface ToolMetadata<S extends z.AnyZodObject = z.AnyZodObject> {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: S;
  readonly annotations?: {
    readOnlyHint?: boolean;
    destructiveHint?: boolean;
    idempotentHint?: boolean;
    openWorldHint?: boolean;
  };
}

/** A tool ready to be served; execute resolves to the text handed back to the caller. */
export interface RegisteredTool {
  readonly metadata: ToolMetadata;
  readonly execute: (args: Record<string, unknown>) => Promise<string>;
}
