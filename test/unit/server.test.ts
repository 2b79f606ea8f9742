import fs from 'fs/promises';
import path from 'path';
import os from 'os';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { createContext, createServer } from '../../src/server.js';
import { LocalExecutor } from '../../src/execution/executor.js';
import { defaultConfig } from '../../src/config/loader.js';
import { ashlarTools } from '../../src/tools/ashlar/index.js';
import { defineTool } from '../../src/tools/helpers.js';
import { FakeExecutor } from '../helpers/fake-executor.js';

describe('server startup', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ashlar-server-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('loads config and runs ashlar through the local executor', async () => {
    const configPath = path.join(tmpDir, 'config.yaml');
    await fs.writeFile(configPath, 'ashlar:\n  executable: /opt/ashlar/bin/ashlar\n');

    const ctx = createContext(configPath);

    expect(ctx.executor).toBeInstanceOf(LocalExecutor);
    expect(ctx.config.ashlar.executable).toBe('/opt/ashlar/bin/ashlar');
  });
});

describe('MCP dispatch', () => {
  let tmpDir: string;
  let server: McpServer;
  let client: Client;

  const failing = defineTool(
    { name: 'failing_tool', description: 'Always throws', inputSchema: z.object({}) },
    async () => {
      throw new Error('disk full');
    },
  );

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'ashlar-dispatch-'));
    const ctx = { executor: new FakeExecutor(), config: defaultConfig() };
    server = createServer([...ashlarTools(ctx), failing]);
    client = new Client({ name: 'ashlar-test-client', version: '0.0.0' });

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([client.connect(clientTransport), server.connect(serverTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('lists every tool', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name)).toEqual([
      'stitch_and_register_tiles_ashlar',
      'align_cyclic_images_ashlar',
      'stitch_microscopy_tiles_ashlar',
      'failing_tool',
    ]);
  });

  it('returns the report as text content', async () => {
    const missing = path.join(tmpDir, 'cycle1.ome.tif');
    const result = await client.callTool({ name: 'align_cyclic_images_ashlar', arguments: { cycle_files: [missing] } });

    expect(result.content).toEqual([{ type: 'text', text: `Error: Input files not found: ${missing}` }]);
    expect(result.isError).toBeUndefined();
  });

  it('turns a thrown error into an isError result', async () => {
    const result = await client.callTool({ name: 'failing_tool', arguments: {} });

    expect(result.content).toEqual([{ type: 'text', text: 'Error: disk full' }]);
    expect(result.isError).toBe(true);
  });
});
