import { z } from "zod";

/** A parameter that takes either one value or a list of them. */
export type OneOrMany<T> = T | readonly T[];

export function toList<T>(value: OneOrMany<T>): T[];
export function toList<T>(value: OneOrMany<T> | undefined): T[] | undefined;
export function toList<T>(value: OneOrMany<T> | undefined): T[] | undefined {
  if (value === undefined) return undefined;
  return isList(value) ? [...value] : [value];
}

function isList<T>(value: OneOrMany<T>): value is readonly T[] {
  return Array.isArray(value);
}

export const DEFAULT_OUTPUT_PATH = "ashlar_output.ome.tif";
export const DEFAULT_ALIGN_CHANNEL = 0;
export const DEFAULT_MAXIMUM_SHIFT = 15;
export const DEFAULT_TILE_SIZE = 1024;

/** Caller-facing request for a stitching/registration run. */
export interface StitchRequest {
  /** Image files, one per cycle; BioFormats vendor formats or plain TIFF. */
  inputFiles: OneOrMany<string>;
  /** Relative to outputDir unless absolute. A `.ome.tif` suffix makes ashlar write a pyramid. */
  outputPath?: string;
  alignChannel?: number;
  /** Maximum per-tile corrective shift, in microns. */
  maximumShift?: number;
  /** Gaussian pre-alignment filter sigma in pixels. Omitted means the flag is not passed. */
  filterSigma?: number;
  tileSize?: number;
  ffpFiles?: OneOrMany<string>;
  dfpFiles?: OneOrMany<string>;
  flipX?: boolean;
  flipY?: boolean;
  outputDir?: string;
}

/** Request after defaults are applied and single paths are lifted into lists. */
export interface ResolvedStitchRequest {
  readonly inputFiles: readonly string[];
  readonly outputPath: string;
  readonly alignChannel: number;
  readonly maximumShift: number;
  readonly filterSigma?: number;
  readonly tileSize: number;
  readonly ffpFiles?: readonly string[];
  readonly dfpFiles?: readonly string[];
  readonly flipX: boolean;
  readonly flipY: boolean;
  readonly outputDir: string;
}

const pathList = z.array(z.string().min(1, "path must not be empty"));

/** Numeric and flag domains; file existence is checked separately against the filesystem. */
const optionsSchema = z.object({
  outputPath: z.string().min(1),
  alignChannel: z.number().int().nonnegative(),
  maximumShift: z.number().finite().positive(),
  filterSigma: z.number().finite().nonnegative().optional(),
  tileSize: z.number().int().positive(),
  ffpFiles: pathList.optional(),
  dfpFiles: pathList.optional(),
  flipX: z.boolean(),
  flipY: z.boolean(),
  outputDir: z.string().min(1),
});

export type ResolveResult =
  | { ok: true; request: ResolvedStitchRequest }
  | { ok: false; problems: string[] };

/** An empty path or an empty list means no profile was given. */
function profileList(value: OneOrMany<string> | undefined): string[] | undefined {
  if (value === "") return undefined;
  const list = toList<string>(value);
  return list && list.length > 0 ? list : undefined;
}

/** Apply defaults and validate option domains. */
export function resolveStitchRequest(request: StitchRequest, defaultOutputDir: string): ResolveResult {
  const parsed = optionsSchema.safeParse({
    outputPath: request.outputPath ?? DEFAULT_OUTPUT_PATH,
    alignChannel: request.alignChannel ?? DEFAULT_ALIGN_CHANNEL,
    maximumShift: request.maximumShift ?? DEFAULT_MAXIMUM_SHIFT,
    filterSigma: request.filterSigma,
    tileSize: request.tileSize ?? DEFAULT_TILE_SIZE,
    ffpFiles: profileList(request.ffpFiles),
    dfpFiles: profileList(request.dfpFiles),
    flipX: request.flipX ?? false,
    flipY: request.flipY ?? false,
    outputDir: request.outputDir ?? defaultOutputDir,
  });
  if (!parsed.success) {
    return {
      ok: false,
      problems: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    };
  }
  return { ok: true, request: { ...parsed.data, inputFiles: toList<string>(request.inputFiles) } };
}
