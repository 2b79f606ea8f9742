import pino from "pino";

// stdout carries the MCP protocol stream, so every log line goes to fd 2.
export const logger = pino(
  {
    name: "ashlar-mcp",
    level: process.env.LOG_LEVEL ?? "info",
  },
  pino.destination(2),
);
