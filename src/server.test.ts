import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createMcpServer } from './server.js';

const text = 'a\n  b\n    c\n  d\ne\n';

describe('subtree MCP server', () => {
  const server = createMcpServer();
  const client = new Client({ name: 'subtree-test', version: '0.0.0' });

  beforeAll(async () => {
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterAll(async () => {
    await client.close();
    await server.close();
  });

  it('registers the tree tools', async () => {
    const { tools } = await client.listTools();
    expect(tools.map((tool) => tool.name).sort()).toEqual([
      'tree.children',
      'tree.render',
      'tree.themes',
    ]);
  });

  it('renders a subtree as JSON', async () => {
    const result = await client.callTool({
      name: 'tree.render',
      arguments: { text, path: ['a'], format: 'json' },
    });
    expect(result).toMatchObject({
      structuredContent: { output: '{"a":[{"b":["c"]},"d"]}' },
      content: [{ type: 'text', text: '{"a":[{"b":["c"]},"d"]}' }],
    });
  });

  it('renders with a theme or literal glyphs', async () => {
    const themed = await client.callTool({
      name: 'tree.render',
      arguments: { text, theme: 'ascii', path: ['a'], root: 'hide' },
    });
    expect(themed).toMatchObject({ structuredContent: { output: '|-- b\n|   `-- c\n`-- d\n' } });

    const glyphs = await client.callTool({
      name: 'tree.render',
      arguments: { text: 'x\n  y\n', glyphs: ['+ ', '| ', '\\ ', '  '] },
    });
    expect(glyphs).toMatchObject({ structuredContent: { output: '\\ x\n  \\ y\n' } });
  });

  it('rejects a theme outside plain output', async () => {
    const result = await client.callTool({
      name: 'tree.render',
      arguments: { text, theme: 'ascii', format: 'json' },
    });
    expect(result).toMatchObject({ isError: true });
    expect(JSON.stringify(result)).toContain('theme/glyphs only apply to plain output');
  });

  it('lists children at a path', async () => {
    const result = await client.callTool({
      name: 'tree.children',
      arguments: { text, path: ['a'] },
    });
    expect(result).toMatchObject({
      structuredContent: {
        children: [
          { index: 0, value: 'b', childCount: 1 },
          { index: 1, value: 'd', childCount: 0 },
        ],
      },
    });
  });

  it('lists themes', async () => {
    const result = await client.callTool({ name: 'tree.themes', arguments: {} });
    expect(result).toMatchObject({
      structuredContent: { themes: expect.arrayContaining(['single', 'dark-single']) },
    });
  });

  it('reports resolution failures as tool errors', async () => {
    const result = await client.callTool({
      name: 'tree.render',
      arguments: { text, path: ['z'] },
    });
    expect(result).toMatchObject({ isError: true });
    expect(JSON.stringify(result)).toContain('No child matches \\"z\\"; available: a e');
  });
});
