import { isAbsolute, join } from "node:path";
import type { Command } from "../types/command.js";
import type { ResolvedStitchRequest } from "./options.js";

/** Where ashlar writes its output: outputPath as given when absolute, otherwise under outputDir. */
export function resolveOutputFile(request: Pick<ResolvedStitchRequest, "outputPath" | "outputDir">): string {
  return isAbsolute(request.outputPath) ? request.outputPath : join(request.outputDir, request.outputPath);
}

/**
 * Build the ashlar argv. Flag order matters to ashlar's argument parser:
 * inputs, -o, -c, -m, --filter-sigma, --tile-size, --ffp, --dfp, --flip-x, --flip-y.
 */
export function buildAshlarCommand(
  request: ResolvedStitchRequest,
  executable: string,
  env?: Readonly<Record<string, string>>,
): Command {
  const argv: string[] = [executable, ...request.inputFiles];

  argv.push("-o", resolveOutputFile(request));
  argv.push("-c", String(request.alignChannel));
  argv.push("-m", String(request.maximumShift));
  if (request.filterSigma !== undefined) {
    argv.push("--filter-sigma", String(request.filterSigma));
  }
  argv.push("--tile-size", String(request.tileSize));

  if (request.ffpFiles) argv.push("--ffp", ...request.ffpFiles);
  if (request.dfpFiles) argv.push("--dfp", ...request.dfpFiles);

  if (request.flipX) argv.push("--flip-x");
  if (request.flipY) argv.push("--flip-y");

  return env && Object.keys(env).length > 0 ? { argv, env } : { argv };
}

/** Human-readable form of a command line for reports and logs. */
export function formatCommand(command: Command): string {
  return command.argv.join(" ");
}
