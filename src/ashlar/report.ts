import { formatCommand } from "./command.js";
import type { ResolvedStitchRequest } from "./options.js";
import type { FailedRun, StitchRun, SucceededRun } from "./types.js";

const BYTES_PER_MIB = 1024 ** 2;

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as YYYY-MM-DD HH:MM:SS. */
export function formatTimestamp(date: Date): string {
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

export function formatMebibytes(bytes: number): string {
  return (bytes / BYTES_PER_MIB).toFixed(2);
}

function parameterLines(request: ResolvedStitchRequest): string[] {
  const lines = [
    "## Input Parameters",
    `- Number of input files: ${request.inputFiles.length}`,
    `- Output path: ${request.outputPath}`,
    `- Alignment channel: ${request.alignChannel}`,
    `- Maximum shift: ${request.maximumShift} microns`,
  ];
  if (request.filterSigma !== undefined) {
    lines.push(`- Gaussian filter sigma: ${request.filterSigma} pixels`);
  }
  lines.push(`- Tile size: ${request.tileSize} pixels`);
  if (request.ffpFiles) lines.push(`- Flat field profiles: ${request.ffpFiles.length} file(s)`);
  if (request.dfpFiles) lines.push(`- Dark field profiles: ${request.dfpFiles.length} file(s)`);
  if (request.flipX) lines.push("- Flip X: enabled");
  if (request.flipY) lines.push("- Flip Y: enabled");
  return lines;
}

function successLines(run: SucceededRun): string[] {
  const lines = ["✓ ASHLAR completed successfully", ""];
  const stdout = run.stdout.trimEnd();
  if (stdout) {
    lines.push("## ASHLAR Output", stdout, "");
  }
  if (run.output) {
    lines.push(
      "## Results",
      `- Output file: ${run.output.path}`,
      `- File size: ${formatMebibytes(run.output.sizeBytes)} MiB`,
      "",
    );
  }
  lines.push(
    "## Conclusion",
    "Image stitching and registration completed successfully.",
    `Registered image saved to: ${run.outputFile}`,
  );
  return lines;
}

function failureHeadline(run: FailedRun): string {
  if (run.killed) {
    const by = run.signal ? ` (${run.signal})` : "";
    return `✗ Error: ASHLAR was killed${by} after exceeding the configured timeout or output limit`;
  }
  if (run.signal) {
    return `✗ Error: ASHLAR was terminated by signal ${run.signal}`;
  }
  return `✗ Error: ASHLAR failed with exit code ${run.exitCode}`;
}

/** Render a run as the multi-line text report handed back to callers. */
export function renderReport(run: StitchRun): string {
  if (run.status === "rejected") {
    return `Error: ${run.error.message}`;
  }

  const lines = [
    "# ASHLAR Image Stitching and Registration",
    `Date: ${formatTimestamp(run.startedAt)}`,
    "",
    ...parameterLines(run.request),
    "",
    "## Processing",
    `Command: ${formatCommand(run.command)}`,
    "",
    "Running ASHLAR stitching and registration...",
  ];

  switch (run.status) {
    case "succeeded":
      lines.push(...successLines(run));
      break;
    case "failed":
      lines.push(
        "",
        failureHeadline(run),
        "",
        "Error message:",
        run.stderr.trimEnd(),
      );
      break;
    case "errored":
      lines.push("", `✗ Error: ${run.message}`);
      break;
  }

  return lines.join("\n");
}
