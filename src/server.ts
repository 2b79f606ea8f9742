#!/usr/bin/env node

import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { z } from "zod";

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { LocalExecutor } from "./execution/executor.js";
import { ashlarTools } from "./tools/ashlar/index.js";
import type { InvokerContext } from "./ashlar/types.js";
import type { RegisteredTool } from "./types/tool.js";

const SERVER_NAME = "ashlar-mcp";
const SERVER_VERSION = "0.1.0";

/** Load config and pick the executor. Split from main() so startup can be exercised without stdio. */
export function createContext(configPath?: string): InvokerContext {
  const { config, configPath: resolvedConfigPath, firstRun } = loadConfig(configPath);
  logger.info({ configPath: resolvedConfigPath, firstRun, executable: config.ashlar.executable }, "Configuration loaded");
  return { config, executor: new LocalExecutor() };
}

/** An MCP server exposing each tool under its own name; tool names must be unique. */
export function createServer(tools: readonly RegisteredTool[]): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });

  for (const tool of tools) {
    const meta = tool.metadata;
    const name = meta.name;
    const inputShape: Record<string, z.ZodTypeAny> = { ...meta.inputSchema.shape };

    server.registerTool(
      name,
      {
        title: name,
        description: meta.description,
        inputSchema: inputShape,
        annotations: meta.annotations,
      },
      async (args: Record<string, unknown>) => {
        try {
          const text = await tool.execute(args);
          return { content: [{ type: "text" as const, text }] };
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          logger.error({ tool: name, error: message }, "Tool execution error");
          return {
            content: [{ type: "text" as const, text: `Error: ${message}` }],
            isError: true,
          };
        }
      },
    );
  }

  return server;
}

async function main(): Promise<void> {
  logger.info(`Starting ${SERVER_NAME} server`);
  const ctx = createContext(process.env.ASHLAR_MCP_CONFIG);
  const tools = ashlarTools(ctx);
  const server = createServer(tools);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: tools.length }, `${SERVER_NAME} server running on stdio`);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    logger.fatal({ error: err }, "Fatal startup error");
    process.exit(1);
  });
}
