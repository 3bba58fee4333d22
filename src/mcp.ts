#!/usr/bin/env node

/**
 * CLI entrypoint for the stdio MCP server.
 *
 * This module is intentionally tiny:
 * - Start the server over stdio (the MCP transport).
 * - Provide stable `--help` and `--version` output.
 */
import { runStdioServer } from './server.js';
import { SUBTREE_VERSION } from './tree/constants.js';

function printHelp(): void {
  process.stdout.write(
    [
      'subtree-mcp (stdio MCP server)',
      '',
      'Usage:',
      '  subtree-mcp',
      '',
      'Tools: tree.render, tree.children, tree.themes',
      '',
      'Options:',
      '  --help     Show help',
      '  --version  Show version',
      '',
    ].join('\n')
  );
}

async function main(): Promise<void> {
  const argv = process.argv.slice(2);

  if (argv.includes('--help') || argv.includes('-h')) {
    printHelp();
    return;
  }

  if (argv.includes('--version') || argv.includes('-v')) {
    process.stdout.write(`subtree-mcp ${SUBTREE_VERSION}\n`);
    return;
  }

  const unknown = argv[0];
  if (unknown !== undefined) {
    process.stderr.write(`Unknown argument: ${unknown}\n`);
    process.exitCode = 1;
    return;
  }

  await runStdioServer();
}

await main();
