export enum StitchErrorCode {
  NO_INPUT_FILES = "NO_INPUT_FILES",
  INVALID_OPTIONS = "INVALID_OPTIONS",
  INPUT_NOT_FOUND = "INPUT_NOT_FOUND",
  NO_MATCHING_TILES = "NO_MATCHING_TILES",
  LAUNCH_FAILED = "LAUNCH_FAILED",
}

export class StitchError extends Error {
  readonly code: StitchErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: StitchErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = "StitchError";
    this.code = code;
    this.context = context;
  }
}
