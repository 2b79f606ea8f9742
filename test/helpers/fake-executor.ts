import type { Command } from '../../src/types/command.js';
import type { ExecOptions, ExecResult, Executor } from '../../src/execution/executor.js';

export interface RecordedCall {
  command: Command;
  options: ExecOptions;
}

type Responder = (command: Command) => ExecResult | Promise<ExecResult>;

/** In-process stand-in for the ashlar binary: records every call and answers with `respond`. */
export class FakeExecutor implements Executor {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly respond: Responder = () => exited(0)) {}

  async execute(command: Command, options: ExecOptions): Promise<ExecResult> {
    this.calls.push({ command, options });
    return this.respond(command);
  }
}

export function exited(exitCode: number, stdout = '', stderr = ''): ExecResult {
  return { exitCode, stdout, stderr, durationMs: 5, killed: false };
}

/** The value following `flag` in argv, e.g. the output path after `-o`. */
export function argAfter(command: Command, flag: string): string | undefined {
  const i = command.argv.indexOf(flag);
  return i >= 0 ? command.argv[i + 1] : undefined;
}
