// Config loader — reads ~/.config/ashlar-mcp/config.yaml and validates it against configSchema.
// On first run (no config file), writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// Keys missing from the file take their zod defaults, so users override only what they set.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { configSchema, type ServerConfig } from "../types/config.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "ashlar-mcp");
const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

/** Default config YAML written on first run. */
export const DEFAULT_CONFIG_YAML = `# ashlar-mcp — Configuration
# Generated automatically on first run. All values shown are defaults.

ashlar:
  # Program name on PATH, or an absolute path to the ashlar executable
  executable: ashlar
  # Seconds to wait for a run before killing it; 0 waits indefinitely
  timeout_seconds: 0
  # Ceiling on captured stdout/stderr, in MiB
  max_buffer_mb: 64
  # Extra environment variables for the ashlar process
  env: {}

defaults:
  # Directory outputs are written to when a call does not name one
  output_dir: ./
`;

export interface ConfigResult {
  config: ServerConfig;
  configPath: string;
  firstRun: boolean;
}

export function defaultConfig(): ServerConfig {
  return configSchema.parse({});
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found — generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: defaultConfig(), configPath, firstRun: true };
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    const parsed: unknown = parseYaml(raw);
    const result = configSchema.safeParse(parsed ?? {});
    if (!result.success) {
      logger.error({ configPath, issues: result.error.issues }, "Invalid config — using defaults");
      return { config: defaultConfig(), configPath, firstRun: false };
    }
    return { config: result.data, configPath, firstRun: false };
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to parse config — using defaults");
    return { config: defaultConfig(), configPath, firstRun: false };
  }
}
