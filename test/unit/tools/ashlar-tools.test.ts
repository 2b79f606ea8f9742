import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { ashlarTools } from '../../../src/tools/ashlar/index.js';
import { defaultConfig } from '../../../src/config/loader.js';
import type { RegisteredTool } from '../../../src/types/tool.js';
import { FakeExecutor } from '../../helpers/fake-executor.js';

describe('ashlar tools', () => {
  let tmpDir: string;
  let executor: FakeExecutor;
  let tools: RegisteredTool[];

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ashlar-tools-'));
    executor = new FakeExecutor();
    tools = ashlarTools({ executor, config: defaultConfig() });
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  async function call(name: string, args: Record<string, unknown>): Promise<string> {
    const tool = tools.find((candidate) => candidate.metadata.name === name);
    if (!tool) throw new Error(`tool not registered: ${name}`);
    return tool.execute(args);
  }

  it('defines the three stitching tools in order', () => {
    expect(tools.map((tool) => tool.metadata.name)).toEqual([
      'stitch_and_register_tiles_ashlar',
      'align_cyclic_images_ashlar',
      'stitch_microscopy_tiles_ashlar',
    ]);
  });

  it('returns an Error text for arguments of the wrong type', async () => {
    const text = await call('stitch_and_register_tiles_ashlar', { input_files: 42 });
    expect(text.startsWith('Error: Invalid arguments: input_files: ')).toBe(true);
    expect(executor.calls).toHaveLength(0);
  });

  it('requires the input list', async () => {
    const text = await call('align_cyclic_images_ashlar', {});
    expect(text.startsWith('Error: Invalid arguments: cycle_files: ')).toBe(true);
  });

  it('maps snake_case arguments onto the ashlar command line', async () => {
    const tile = path.join(tmpDir, 'cycle1.rcpnl');
    await fs.writeFile(tile, 'x');
    const outDir = path.join(tmpDir, 'out');

    await call('stitch_and_register_tiles_ashlar', {
      input_files: tile,
      output_path: 'merged.ome.tif',
      align_channel: 1,
      maximum_shift: 30,
      filter_sigma: 0,
      tile_size: 512,
      ffp_files: 'ffp.tif',
      dfp_files: ['dfp.tif'],
      flip_x: true,
      output_dir: outDir,
    });

    expect(executor.calls[0]?.command.argv).toEqual([
      'ashlar', tile,
      '-o', path.join(outDir, 'merged.ome.tif'),
      '-c', '1',
      '-m', '30',
      '--filter-sigma', '0',
      '--tile-size', '512',
      '--ffp', 'ffp.tif',
      '--dfp', 'dfp.tif',
      '--flip-x',
    ]);
  });

  it('passes through the report of a rejected run', async () => {
    const missing = path.join(tmpDir, 'missing.tif');
    expect(await call('align_cyclic_images_ashlar', { cycle_files: [missing] }))
      .toBe(`Error: Input files not found: ${missing}`);
  });

  it('stitches a tile directory', async () => {
    await fs.writeFile(path.join(tmpDir, 'b.tif'), 'b');
    await fs.writeFile(path.join(tmpDir, 'a.tif'), 'a');

    await call('stitch_microscopy_tiles_ashlar', { tile_directory: tmpDir, output_dir: path.join(tmpDir, 'out') });

    expect(executor.calls[0]?.command.argv.slice(0, 3)).toEqual([
      'ashlar',
      path.join(tmpDir, 'a.tif'),
      path.join(tmpDir, 'b.tif'),
    ]);
  });
});
