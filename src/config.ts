import { resolve } from 'node:path';
import type { OutputFormat, RootVisibility, SubtreeOptions, ThemeSelection } from './tree/api.js';

/**
 * Runtime configuration for one `subtree` invocation.
 *
 * Everything comes from argv: there are no config files or environment
 * variables.
 */
export interface SubtreeConfig {
  /** Absolute input path; stdin when omitted. */
  inputPath?: string;
  options: SubtreeOptions;
  help: boolean;
  version: boolean;
  listThemes: boolean;
}

const NEGATIVE_INDEX_RE = /^-\d+$/;

/**
 * Consume a boolean flag (any of its spellings) from argv.
 *
 * Returns true if the flag was present and removed.
 */
function takeFlag(argv: string[], names: readonly string[]): boolean {
  let found = false;
  for (const name of names) {
    let index = argv.indexOf(name);
    while (index !== -1) {
      argv.splice(index, 1);
      found = true;
      index = argv.indexOf(name);
    }
  }
  return found;
}

/**
 * Consume a `--flag value` or `--flag=value` option from argv.
 *
 * Returns undefined when absent. Throws if present but missing a value.
 */
function takeOption(argv: string[], names: readonly string[]): string | undefined {
  for (const name of names) {
    const indexEq = argv.findIndex((arg) => arg.startsWith(`${name}=`));
    if (indexEq !== -1) {
      const value = argv[indexEq]?.slice(name.length + 1);
      argv.splice(indexEq, 1);
      if (!value) throw new Error(`Missing value for ${name}`);
      return value;
    }

    const index = argv.indexOf(name);
    if (index === -1) continue;
    const value = argv[index + 1];
    argv.splice(index, 2);
    if (value === undefined) throw new Error(`Missing value for ${name}`);
    return value;
  }
  return undefined;
}

/**
 * Consume a flag followed by exactly `count` values.
 */
function takeOptionValues(
  argv: string[],
  names: readonly string[],
  count: number
): string[] | undefined {
  for (const name of names) {
    const index = argv.indexOf(name);
    if (index === -1) continue;
    const values = argv.slice(index + 1, index + 1 + count);
    argv.splice(index, 1 + count);
    if (values.length !== count) {
      throw new Error(`${name} takes ${count} values, got ${values.length}`);
    }
    return values;
  }
  return undefined;
}

/**
 * Reject leftover `-x` / `--unknown` tokens. Negative numbers are path indices.
 */
function assertNoUnknownFlags(argv: string[]): void {
  const unknown = argv.find(
    (arg) => arg.startsWith('-') && arg !== '-' && !NEGATIVE_INDEX_RE.test(arg)
  );
  if (unknown) throw new Error(`Unknown option: ${unknown}`);
}

function takeFormat(argv: string[]): OutputFormat | undefined {
  const indices = takeFlag(argv, ['--indices', '-i']);
  const json = takeFlag(argv, ['--json', '-j']);
  if (indices && json) throw new Error('--indices and --json are mutually exclusive');
  if (indices) return 'indices';
  if (json) return 'json';
  return undefined;
}

function takeRootVisibility(argv: string[]): RootVisibility | undefined {
  const show = takeFlag(argv, ['--show-root', '-s']);
  const hide = takeFlag(argv, ['--hide-root', '-H']);
  if (show && hide) throw new Error('--show-root and --hide-root are mutually exclusive');
  if (show) return 'show';
  if (hide) return 'hide';
  return undefined;
}

function takeTheme(argv: string[]): ThemeSelection | undefined {
  const name = takeOption(argv, ['--theme', '-t']);
  const glyphs = takeOptionValues(argv, ['--glyphs', '-g'], 4);
  if (name !== undefined && glyphs) throw new Error('--theme and --glyphs are mutually exclusive');
  if (name !== undefined) return { kind: 'preset', name };
  if (glyphs) return { kind: 'glyphs', glyphs };
  return undefined;
}

/**
 * Parse CLI args into a `SubtreeConfig`.
 *
 * Tokens after `--` are always path components; remaining positionals before it
 * are path components too.
 */
export function loadConfigFromArgs(args: string[], cwd: string): SubtreeConfig {
  const separator = args.indexOf('--');
  const argv = separator === -1 ? [...args] : args.slice(0, separator);
  const trailing = separator === -1 ? [] : args.slice(separator + 1);

  // Options with values first, so a value that looks like a flag stays a value.
  const file = takeOption(argv, ['--file', '-f']);
  const pattern = takeOption(argv, ['--pattern', '-p']);
  const theme = takeTheme(argv);

  const help = takeFlag(argv, ['--help', '-h']);
  const version = takeFlag(argv, ['--version', '-v']);
  const listThemes = takeFlag(argv, ['--themes']);
  const after = takeFlag(argv, ['--after', '-a']);
  const last = takeFlag(argv, ['--last', '-l']);
  const format = takeFormat(argv);
  const root = takeRootVisibility(argv);
  assertNoUnknownFlags(argv);

  if (theme && format) throw new Error('--theme/--glyphs only apply to plain output');

  const inputPath = file === undefined || file === '-' ? undefined : resolve(cwd, file);
  const options: SubtreeOptions = {
    pattern,
    after,
    last,
    theme,
    format,
    root,
    path: [...argv, ...trailing],
  };

  return { inputPath, options, help, version, listThemes };
}
