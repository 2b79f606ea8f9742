import type { Command } from "../types/command.js";
import type { ServerConfig } from "../types/config.js";
import type { Executor } from "../execution/executor.js";
import type { StitchError } from "../errors.js";
import type { ResolvedStitchRequest } from "./options.js";

/** What the invoker needs from its surroundings. */
export interface InvokerContext {
  readonly executor: Executor;
  readonly config: ServerConfig;
  /** Clock for the report timestamp; defaults to the wall clock. */
  readonly now?: () => Date;
}

/** The artifact ashlar left behind, if any. */
export interface OutputArtifact {
  readonly path: string;
  readonly sizeBytes: number;
}

/** Fields shared by every run that got past validation. */
interface RunBase {
  readonly request: ResolvedStitchRequest;
  readonly command: Command;
  readonly outputFile: string;
  readonly startedAt: Date;
}

export interface RejectedRun {
  readonly status: "rejected";
  readonly error: StitchError;
}

export interface SucceededRun extends RunBase {
  readonly status: "succeeded";
  readonly stdout: string;
  readonly durationMs: number;
  /** null when ashlar exited 0 but the output file is not there. */
  readonly output: OutputArtifact | null;
}

export interface FailedRun extends RunBase {
  readonly status: "failed";
  readonly exitCode: number;
  /** ashlar was stopped by the timeout or output limit rather than failing on its own. */
  readonly killed: boolean;
  readonly signal?: string;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
}

export interface ErroredRun extends RunBase {
  readonly status: "errored";
  readonly message: string;
}

export type StitchRun = RejectedRun | SucceededRun | FailedRun | ErroredRun;
