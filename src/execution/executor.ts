// Command execution layer — the only module that spawns child processes.
// Provides the Executor interface; LocalExecutor is the sole implementation today.
// Tests swap in a fake Executor so no real ashlar binary is needed.
import { execFile, type ExecFileException } from "node:child_process";
import type { Command } from "../types/command.js";
import { StitchError, StitchErrorCode } from "../errors.js";
import { logger } from "../logger.js";

/** Result of a process that ran to completion (any exit code). */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
  /** True when the executor killed the process for running past timeoutMs or exceeding maxBufferBytes. */
  readonly killed: boolean;
  /** Signal that terminated the process, if it did not exit on its own. */
  readonly signal?: string;
}

export interface ExecOptions {
  /** 0 disables the timeout. */
  readonly timeoutMs: number;
  readonly maxBufferBytes: number;
}

/**
 * Executor interface. Resolves for every process that ran, whatever its exit code;
 * rejects with LAUNCH_FAILED when the program could not be started at all.
 */
export interface Executor {
  execute(command: Command, options: ExecOptions): Promise<ExecResult>;
}

/** Processes killed by a signal or the timeout have no numeric status; report them as 1. */
function exitCodeOf(error: ExecFileException): number {
  return typeof error.code === "number" ? error.code : 1;
}

const MAX_BUFFER_EXCEEDED = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";

/** Spawn failures carry a string errno code (ENOENT, EACCES) instead of an exit status. */
function isLaunchFailure(error: ExecFileException): boolean {
  return typeof error.code === "string" && error.code !== MAX_BUFFER_EXCEEDED;
}

export class LocalExecutor implements Executor {
  async execute(command: Command, options: ExecOptions): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (cmd === undefined) {
      throw new StitchError(StitchErrorCode.LAUNCH_FAILED, "Empty command line");
    }

    return new Promise<ExecResult>((resolve, reject) => {
      execFile(
        cmd,
        args,
        {
          timeout: options.timeoutMs,
          maxBuffer: options.maxBufferBytes,
          env: command.env ? { ...process.env, ...command.env } : process.env,
          encoding: "utf-8",
          // Never through a shell: input paths go to ashlar verbatim.
          shell: false,
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start);
          const out = { stdout: stdout ?? "", stderr: stderr ?? "" };
          if (error && isLaunchFailure(error)) {
            logger.debug({ cmd, code: error.code }, "Process launch failed");
            reject(new StitchError(StitchErrorCode.LAUNCH_FAILED, `Failed to launch ${cmd}: ${error.message}`, {
              errno: error.code,
            }));
            return;
          }
          if (!error) {
            resolve({ ...out, exitCode: 0, durationMs, killed: false });
            return;
          }
          // A timeout sets killed; the output limit only shows as its error code.
          const killed = error.killed === true || error.code === MAX_BUFFER_EXCEEDED;
          if (killed) {
            logger.warn({ cmd, signal: error.signal, code: error.code, durationMs }, "Process killed");
          }
          resolve({
            ...out,
            exitCode: exitCodeOf(error),
            durationMs,
            killed,
            ...(error.signal ? { signal: error.signal } : {}),
          });
        },
      );
    });
  }
}
