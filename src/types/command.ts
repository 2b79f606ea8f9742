/**
 * A structured command ready for execution.
 * Callers never build shell strings; argv[0] is the program, the rest are passed verbatim.
 */
export interface Command {
  readonly argv: readonly string[];
  readonly env?: Readonly<Record<string, string>>;
}
