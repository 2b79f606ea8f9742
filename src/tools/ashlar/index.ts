import { z } from "zod";
import { defineTool } from "../helpers.js";
import { alignCyclicImages, stitchAndRegisterTiles, stitchTilesFromDirectory } from "../../ashlar/invoker.js";
import type { InvokerContext } from "../../ashlar/types.js";
import type { RegisteredTool } from "../../types/tool.js";

const oneOrManyPaths = z.union([z.string(), z.array(z.string())]);

export const stitchInputSchema = z.object({
  input_files: oneOrManyPaths.describe("Image file paths to process, one per cycle. BioFormats-supported vendor formats or plain TIFF."),
  output_path: z.string().optional().describe("Output file path. A .ome.tif suffix writes pyramidal OME-TIFF. Default: ashlar_output.ome.tif"),
  align_channel: z.number().optional().describe("Reference channel for alignment, numbered from 0. Default: 0"),
  maximum_shift: z.number().optional().describe("Maximum allowed per-tile corrective shift in microns. Default: 15"),
  filter_sigma: z.number().optional().describe("Gaussian pre-alignment filter sigma in pixels. Omit for no filtering."),
  tile_size: z.number().optional().describe("Pyramid tile size for OME-TIFF output. Default: 1024"),
  ffp_files: oneOrManyPaths.optional().describe("Flat field profile image(s): one common file or one per cycle."),
  dfp_files: oneOrManyPaths.optional().describe("Dark field profile image(s): one common file or one per cycle."),
  flip_x: z.boolean().optional().describe("Flip tile positions left-to-right."),
  flip_y: z.boolean().optional().describe("Flip tile positions top-to-bottom."),
  output_dir: z.string().optional().describe("Directory to save output files. Created if missing."),
});

export const alignCyclesInputSchema = z.object({
  cycle_files: oneOrManyPaths.describe("Image files, one per imaging cycle, in order."),
  output_path: z.string().optional().describe("Output OME-TIFF file path. Default: registered_cycles.ome.tif"),
  align_channel: z.number().optional().describe("Channel to use for alignment across cycles. Default: 0"),
  maximum_shift: z.number().optional().describe("Maximum shift between cycles in microns. Default: 30"),
  output_dir: z.string().optional().describe("Output directory."),
});

export const stitchDirectoryInputSchema = z.object({
  tile_directory: z.string().min(1).describe("Directory containing image tiles."),
  output_path: z.string().optional().describe("Output file name. Default: stitched.ome.tif"),
  file_pattern: z.string().optional().describe("Glob pattern matching tile files. Default: *.tif"),
  maximum_shift: z.number().optional().describe("Maximum corrective shift in microns. Default: 15"),
  filter_sigma: z.number().optional().describe("Gaussian pre-alignment filter sigma in pixels."),
  output_dir: z.string().optional().describe("Output directory."),
});

// Every call writes an output file and spawns ashlar: not read-only, not idempotent
// (a rerun overwrites the previous output), but nothing outside the output path is touched.
const annotations = { readOnlyHint: false, destructiveHint: false, idempotentHint: false, openWorldHint: false };

/** The stitching tools, in the order they are advertised. */
export function ashlarTools(ctx: InvokerContext): RegisteredTool[] {
  return [
    defineTool({
      name: "stitch_and_register_tiles_ashlar",
      description: "Stitch and register multi-tile microscopy images using ASHLAR. Performs fast, high-quality stitching and co-registers multiple rounds of cyclic imaging for CyCIF, CODEX, and similar methods. Returns a text report.",
      inputSchema: stitchInputSchema,
      annotations,
    }, async (args) => stitchAndRegisterTiles(ctx, {
      inputFiles: args.input_files,
      outputPath: args.output_path,
      alignChannel: args.align_channel,
      maximumShift: args.maximum_shift,
      filterSigma: args.filter_sigma,
      tileSize: args.tile_size,
      ffpFiles: args.ffp_files,
      dfpFiles: args.dfp_files,
      flipX: args.flip_x,
      flipY: args.flip_y,
      outputDir: args.output_dir,
    })),

    defineTool({
      name: "align_cyclic_images_ashlar",
      description: "Align multiple rounds of cyclic imaging (e.g., CyCIF, CODEX) using ASHLAR. Simplified wrapper for multi-cycle registration in cyclic immunofluorescence methods. Returns a text report.",
      inputSchema: alignCyclesInputSchema,
      annotations,
    }, async (args) => alignCyclicImages(ctx, {
      cycleFiles: args.cycle_files,
      outputPath: args.output_path,
      alignChannel: args.align_channel,
      maximumShift: args.maximum_shift,
      outputDir: args.output_dir,
    })),

    defineTool({
      name: "stitch_microscopy_tiles_ashlar",
      description: "Stitch microscopy tiles from a directory using ASHLAR. Convenience tool for a single imaging round when all tiles are in one directory; tiles are taken in sorted filename order. Returns a text report.",
      inputSchema: stitchDirectoryInputSchema,
      annotations,
    }, async (args) => stitchTilesFromDirectory(ctx, {
      tileDirectory: args.tile_directory,
      filePattern: args.file_pattern,
      outputPath: args.output_path,
      maximumShift: args.maximum_shift,
      filterSigma: args.filter_sigma,
      outputDir: args.output_dir,
    })),
  ];
}
