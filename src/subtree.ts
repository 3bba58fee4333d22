#!/usr/bin/env node

/**
 * `subtree` - reshape indented text as a tree.
 *
 * Reads the whole input (stdin or `--file`), rebuilds the tree, optionally
 * selects a subtree by path, and prints it as-is, themed, index-annotated or as
 * JSON.
 *
 * Important: this module is imported by tests, so it must NOT auto-run when
 * imported. The bottom-of-file "isMain" guard ensures that.
 */

import { existsSync, readFileSync, realpathSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { resolve as resolvePath } from 'node:path';
import { fileURLToPath } from 'node:url';

import { loadConfigFromArgs } from './config.js';
import type { OutputSink } from './render/sink.js';
import { themeNames } from './render/themes.js';
import { renderSubtree } from './tree/api.js';
import { SUBTREE_VERSION } from './tree/constants.js';
import { isSubtreeError } from './tree/errors.js';

export interface SubtreeIo {
  stdout: OutputSink;
  stderr: OutputSink;
  /** Reads all of stdin. */
  readStdin: () => string;
  /** True when stdout is a terminal. */
  interactive: boolean;
}

/** Exit code for bad arguments. */
const EXIT_USAGE = 1;
/** Exit code for a path that does not resolve, or an unusable theme/pattern. */
const EXIT_RESOLUTION = 2;

/**
 * Render CLI help text.
 *
 * Keep this stable and human-readable: tests and users often depend on it.
 */
function helpText(): string {
  return [
    'subtree — reshape indented text as a tree',
    '',
    'Usage:',
    '  subtree [options] [--] [path...]',
    '',
    'Input:',
    '  -f, --file <path>       Read input from a file (default: stdin)',
    '  -p, --pattern <regex>   Where each value starts (default: first non-space, non-box-drawing char)',
    '  -a, --after             Value starts after the match',
    '  -l, --last              Use the last match on a line',
    '',
    'Output (default: input as-is):',
    '  -t, --theme <name>      Draw branches with a named theme (see --themes)',
    '  -g, --glyphs <mid> <vertical> <last> <blank>',
    '                          Draw branches with four literal glyphs',
    '  -i, --indices           Prefix each line with its index path',
    '  -j, --json              Print JSON',
    '  -s, --show-root         Show the starting node (default when a path is given)',
    '  -H, --hide-root         Hide the starting node (default without a path)',
    '',
    'Path:',
    '  Each component is a child index (negative counts from the end) or a child value.',
    '  Prefix a component with \\ to always match it as a value.',
    '',
    'Other:',
    '      --themes            List theme names',
    '  -h, --help              Show help',
    '  -v, --version           Show version',
    '',
  ].join('\n');
}

/**
 * Write help text to stdout.
 *
 * This is used both for explicit `--help` and for error fallback.
 */
function writeHelp(io: SubtreeIo): void {
  io.stdout.write(helpText());
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Run the CLI with a provided argv array (excluding `node` and script path).
 *
 * Returns an exit code, but does not call `process.exit()`. This keeps the CLI
 * testable without relying on spawning child processes.
 */
export async function runSubtreeCli(
  args: string[],
  io: SubtreeIo = {
    stdout: process.stdout,
    stderr: process.stderr,
    readStdin: () => readFileSync(0, 'utf8'),
    interactive: process.stdout.isTTY === true,
  }
): Promise<number> {
  try {
    const config = loadConfigFromArgs(args, process.cwd());

    if (config.help) {
      writeHelp(io);
      return 0;
    }
    if (config.version) {
      io.stdout.write(`subtree ${SUBTREE_VERSION}\n`);
      return 0;
    }
    if (config.listThemes) {
      io.stdout.write(`${themeNames().join('\n')}\n`);
      return 0;
    }

    const text = config.inputPath ? await readFile(config.inputPath, 'utf8') : io.readStdin();
    renderSubtree(text, { ...config.options, interactive: io.interactive }, io.stdout);
    return 0;
  } catch (error) {
    io.stderr.write(`${errorMessage(error)}\n`);
    if (isSubtreeError(error)) return EXIT_RESOLUTION;
    io.stderr.write('\n');
    writeHelp(io);
    return EXIT_USAGE;
  }
}

/**
 * True when this file is the process entrypoint, including through an npm bin
 * symlink.
 */
function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  const self = fileURLToPath(import.meta.url);
  return resolvePath(entry) === self || (existsSync(entry) && realpathSync(entry) === self);
}

if (isMainModule()) {
  const exitCode = await runSubtreeCli(process.argv.slice(2));
  if (exitCode !== 0) process.exitCode = exitCode;
}
