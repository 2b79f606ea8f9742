import { z } from "zod";

/** Full server configuration. Every key is optional in the file; zod fills in defaults. */
export const configSchema = z.object({
  ashlar: z.object({
    executable: z.string().min(1).default("ashlar"),
    // 0 waits for the process indefinitely
    timeout_seconds: z.number().int().nonnegative().default(0),
    max_buffer_mb: z.number().positive().default(64),
    env: z.record(z.string(), z.string()).default({}),
  }).default({}),
  defaults: z.object({
    output_dir: z.string().min(1).default("./"),
  }).default({}),
});

export type ServerConfig = z.infer<typeof configSchema>;
