export {
  runStitch,
  stitchAndRegisterTiles,
  alignCyclicImages,
  stitchTilesFromDirectory,
  findTiles,
} from "./invoker.js";
export type { CycleAlignmentRequest, TileDirectoryRequest } from "./invoker.js";
export { buildAshlarCommand, formatCommand, resolveOutputFile } from "./command.js";
export { resolveStitchRequest, toList } from "./options.js";
export type { OneOrMany, StitchRequest, ResolvedStitchRequest } from "./options.js";
export { renderReport, formatMebibytes, formatTimestamp } from "./report.js";
export type * from "./types.js";
