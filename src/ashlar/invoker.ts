// Runs ashlar for one request and folds the outcome into a StitchRun.
// Expected failures (bad input, nonzero exit, launch errors) never throw out of
// these functions; the returned report is the only error channel.
import { access, mkdir, stat } from "node:fs/promises";
import { join } from "node:path";
import fg from "fast-glob";
import { StitchError, StitchErrorCode } from "../errors.js";
import { logger } from "../logger.js";
import { buildAshlarCommand, formatCommand, resolveOutputFile } from "./command.js";
import { resolveStitchRequest, toList, type OneOrMany, type StitchRequest } from "./options.js";
import { renderReport } from "./report.js";
import type { InvokerContext, OutputArtifact, RejectedRun, StitchRun } from "./types.js";

const BYTES_PER_MIB = 1024 * 1024;

function rejected(code: StitchErrorCode, message: string, context?: Record<string, unknown>): RejectedRun {
  logger.warn({ code, ...context }, message);
  return { status: "rejected", error: new StitchError(code, message, context) };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function findMissing(paths: readonly string[]): Promise<string[]> {
  const present = await Promise.all(paths.map(exists));
  return paths.filter((_, i) => !present[i]);
}

async function readArtifact(path: string): Promise<OutputArtifact | null> {
  try {
    const info = await stat(path);
    return info.isFile() ? { path, sizeBytes: info.size } : null;
  } catch {
    return null;
  }
}

/** Validate, run ashlar once, and describe what happened. */
export async function runStitch(ctx: InvokerContext, request: StitchRequest): Promise<StitchRun> {
  if (request.inputFiles === "" || toList<string>(request.inputFiles).length === 0) {
    return rejected(StitchErrorCode.NO_INPUT_FILES, "No input files provided");
  }

  const resolved = resolveStitchRequest(request, ctx.config.defaults.output_dir);
  if (!resolved.ok) {
    return rejected(StitchErrorCode.INVALID_OPTIONS, `Invalid options: ${resolved.problems.join("; ")}`, {
      problems: resolved.problems,
    });
  }

  const missing = await findMissing(resolved.request.inputFiles);
  if (missing.length > 0) {
    return rejected(StitchErrorCode.INPUT_NOT_FOUND, `Input files not found: ${missing.join(", ")}`, { missing });
  }

  const { ashlar } = ctx.config;
  const command = buildAshlarCommand(resolved.request, ashlar.executable, ashlar.env);
  const base = {
    request: resolved.request,
    command,
    outputFile: resolveOutputFile(resolved.request),
    startedAt: ctx.now ? ctx.now() : new Date(),
  };

  try {
    await mkdir(resolved.request.outputDir, { recursive: true });

    logger.debug({ command: formatCommand(command) }, "Launching ashlar");
    const result = await ctx.executor.execute(command, {
      timeoutMs: ashlar.timeout_seconds * 1000,
      maxBufferBytes: ashlar.max_buffer_mb * BYTES_PER_MIB,
    });

    if (result.exitCode !== 0) {
      logger.warn(
        { exitCode: result.exitCode, killed: result.killed, signal: result.signal, durationMs: result.durationMs },
        "ashlar exited with an error",
      );
      return {
        ...base,
        status: "failed",
        exitCode: result.exitCode,
        killed: result.killed,
        ...(result.signal ? { signal: result.signal } : {}),
        stdout: result.stdout,
        stderr: result.stderr,
        durationMs: result.durationMs,
      };
    }

    const output = await readArtifact(base.outputFile);
    logger.info({ outputFile: base.outputFile, present: output !== null, durationMs: result.durationMs }, "ashlar completed");
    return { ...base, status: "succeeded", stdout: result.stdout, durationMs: result.durationMs, output };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error({ error: message }, "ashlar run failed unexpectedly");
    return { ...base, status: "errored", message };
  }
}

/**
 * Stitch and register multi-tile images, one input file per cycle.
 * Always resolves to a text report, whether or not ashlar succeeded.
 */
export async function stitchAndRegisterTiles(ctx: InvokerContext, request: StitchRequest): Promise<string> {
  return renderReport(await runStitch(ctx, request));
}

export interface CycleAlignmentRequest {
  /** One image file per imaging cycle, in cycle order. */
  cycleFiles: OneOrMany<string>;
  outputPath?: string;
  alignChannel?: number;
  maximumShift?: number;
  outputDir?: string;
}

/** Multi-cycle registration (CyCIF, CODEX) with defaults suited to round-to-round shifts. */
export async function alignCyclicImages(ctx: InvokerContext, request: CycleAlignmentRequest): Promise<string> {
  return stitchAndRegisterTiles(ctx, {
    inputFiles: request.cycleFiles,
    outputPath: request.outputPath ?? "registered_cycles.ome.tif",
    alignChannel: request.alignChannel,
    maximumShift: request.maximumShift ?? 30,
    outputDir: request.outputDir,
  });
}

export interface TileDirectoryRequest {
  tileDirectory: string;
  /** Glob relative to tileDirectory. */
  filePattern?: string;
  outputPath?: string;
  maximumShift?: number;
  filterSigma?: number;
  outputDir?: string;
}

/**
 * Files under directory matching pattern, as directory-joined paths in lexicographic order.
 * A directory that is missing, unreadable or not a directory has no tiles.
 */
export async function findTiles(directory: string, pattern: string): Promise<string[]> {
  const matches = await fg(pattern, { cwd: directory, onlyFiles: true, suppressErrors: true });
  return matches.map((match) => join(directory, match)).sort();
}

/** Stitch every tile of a single imaging round found in one directory. */
export async function stitchTilesFromDirectory(ctx: InvokerContext, request: TileDirectoryRequest): Promise<string> {
  const pattern = request.filePattern ?? "*.tif";
  const tiles = await findTiles(request.tileDirectory, pattern);
  if (tiles.length === 0) {
    const run = rejected(
      StitchErrorCode.NO_MATCHING_TILES,
      `No files matching pattern '${pattern}' found in ${request.tileDirectory}`,
      { pattern, directory: request.tileDirectory },
    );
    return renderReport(run);
  }

  return stitchAndRegisterTiles(ctx, {
    inputFiles: tiles,
    outputPath: request.outputPath ?? "stitched.ome.tif",
    maximumShift: request.maximumShift ?? 15,
    filterSigma: request.filterSigma,
    outputDir: request.outputDir,
  });
}
