import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import * as z from 'zod';
import { themeNames } from './render/themes.js';
import { listChildren, renderSubtreeToString } from './tree/api.js';
import type { SubtreeOptions } from './tree/api.js';
import { SUBTREE_VERSION } from './tree/constants.js';

/**
 * Create an MCP server instance and register all tools.
 *
 * Tool naming convention:
 * - `tree.render` parses text and prints a (sub)tree.
 * - `tree.children` lists the children at a path, for step-by-step navigation.
 * - `tree.themes` lists theme names accepted by `tree.render`.
 *
 * Tools are stateless: every call carries the full input text.
 */
export function createMcpServer(): McpServer {
  const server = new McpServer({ name: 'subtree-mcp', version: SUBTREE_VERSION });

  const matcherShape = {
    text: z.string(),
    pattern: z.string().optional(),
    after: z.boolean().optional(),
    last: z.boolean().optional(),
    path: z.array(z.string()).optional(),
  };

  server.registerTool(
    'tree.render',
    {
      title: 'Render a tree',
      description:
        'Rebuild the tree encoded by indentation in `text`, optionally select a subtree by path (child indices or child values), and print it as-is, with branch glyphs, with index paths, or as JSON.',
      inputSchema: {
        ...matcherShape,
        root: z.enum(['show', 'hide']).optional(),
        format: z.enum(['plain', 'indices', 'json']).optional(),
        theme: z.string().optional(),
        glyphs: z.tuple([z.string(), z.string(), z.string(), z.string()]).optional(),
      },
      outputSchema: {
        output: z.string(),
      },
    },
    async ({ text, pattern, after, last, path, root, format, theme, glyphs }) => {
      if ((theme !== undefined || glyphs) && format !== undefined && format !== 'plain') {
        throw new Error('theme/glyphs only apply to plain output');
      }
      const options: SubtreeOptions = { pattern, after, last, path, root, format };
      if (theme !== undefined) options.theme = { kind: 'preset', name: theme };
      else if (glyphs) options.theme = { kind: 'glyphs', glyphs };

      const output = renderSubtreeToString(text, options);
      return {
        content: [{ type: 'text', text: output }],
        structuredContent: { output },
      };
    }
  );

  server.registerTool(
    'tree.children',
    {
      title: 'List children',
      description:
        'List the children of the node at `path` (the synthetic root when omitted) with their index, value and child count.',
      inputSchema: matcherShape,
      outputSchema: {
        children: z.array(
          z.object({
            index: z.number().int().nonnegative(),
            value: z.string(),
            childCount: z.number().int().nonnegative(),
          })
        ),
      },
    },
    async ({ text, pattern, after, last, path }) => {
      const children = listChildren(text, { pattern, after, last, path });
      return {
        content: [{ type: 'text', text: JSON.stringify({ children }, null, 2) }],
        structuredContent: { children },
      };
    }
  );

  server.registerTool(
    'tree.themes',
    {
      title: 'List themes',
      description: 'List theme names accepted by `tree.render`.',
      inputSchema: {},
      outputSchema: {
        themes: z.array(z.string()),
      },
    },
    async () => {
      const themes = themeNames();
      return {
        content: [{ type: 'text', text: JSON.stringify({ themes }, null, 2) }],
        structuredContent: { themes },
      };
    }
  );

  return server;
}

/**
 * Connect the MCP server to stdio transport and start serving requests.
 *
 * This function does not return until the transport closes.
 */
export async function runStdioServer(): Promise<void> {
  const server = createMcpServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
}
