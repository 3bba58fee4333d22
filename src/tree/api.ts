import { renderAsIs } from '../render/asis.js';
import { renderIndices } from '../render/indices.js';
import { renderJson } from '../render/json.js';
import { createStringSink } from '../render/sink.js';
import type { OutputSink } from '../render/sink.js';
import { renderThemed } from '../render/themed.js';
import { getTheme, themeFromGlyphs } from '../render/themes.js';
import type { Theme } from '../render/themes.js';
import { parseTree } from './build.js';
import type { TreeNode } from './model.js';
import { parsePath, resolvePath } from './path.js';
import { compileMatcher } from './scan.js';
import type { MatcherSource } from './scan.js';
import { sliceText } from './span.js';

/**
 * Public API for parsing, navigating and rendering trees.
 *
 * This module is the boundary shared by the CLI and the MCP server:
 * - scanning/building (`scan.ts`, `build.ts`)
 * - subtree selection (`path.ts`)
 * - output (`../render/*`)
 *
 * The pipeline is one-way: text -> tree -> optional subtree -> one renderer.
 */
export type OutputFormat = 'plain' | 'indices' | 'json';

export type RootVisibility = 'show' | 'hide';

export type ThemeSelection =
  | { kind: 'preset'; name: string }
  | { kind: 'glyphs'; glyphs: readonly string[] };

export interface SubtreeOptions extends MatcherSource {
  /** Raw path components (see `parsePathComponent`). */
  path?: readonly string[];
  /** Explicit root visibility; defaults by whether a path was given. */
  root?: RootVisibility;
  format?: OutputFormat;
  /** Plain output only: draw branches instead of reproducing the input. */
  theme?: ThemeSelection;
  /** Append a newline after JSON output (set when writing to a terminal). */
  interactive?: boolean;
}

export interface ChildSummary {
  index: number;
  value: string;
  childCount: number;
}

/**
 * Hidden when no path is given and nothing overrides it, shown otherwise.
 */
export function shouldShowRoot(options: Pick<SubtreeOptions, 'path' | 'root'>): boolean {
  if (options.root) return options.root === 'show';
  return (options.path?.length ?? 0) > 0;
}

export function selectTheme(selection: ThemeSelection): Theme {
  return selection.kind === 'preset' ? getTheme(selection.name) : themeFromGlyphs(selection.glyphs);
}

/**
 * Parse `text` and return the node addressed by `options.path`.
 */
export function selectSubtree(
  text: string,
  options: Pick<SubtreeOptions, 'pattern' | 'after' | 'last' | 'path'>
): TreeNode {
  const root = parseTree(text, compileMatcher(options));
  return resolvePath(text, root, parsePath(options.path ?? []));
}

/**
 * Run the whole pipeline and write the result to `sink`.
 *
 * Options are checked (theme, pattern, path) before anything is written, so a
 * failing call leaves the sink untouched.
 */
export function renderSubtree(text: string, options: SubtreeOptions, sink: OutputSink): void {
  const theme = options.theme ? selectTheme(options.theme) : undefined;
  const node = selectSubtree(text, options);
  const showRoot = shouldShowRoot(options);

  switch (options.format ?? 'plain') {
    case 'indices':
      renderIndices(text, node, showRoot, sink);
      return;
    case 'json':
      renderJson(text, node, showRoot, sink);
      if (options.interactive) sink.write('\n');
      return;
    case 'plain':
      if (theme) renderThemed(text, node, showRoot, sink, theme);
      else renderAsIs(text, node, showRoot, sink);
      return;
  }
}

export function renderSubtreeToString(text: string, options: SubtreeOptions): string {
  const sink = createStringSink();
  renderSubtree(text, options, sink);
  return sink.text();
}

/**
 * Summarize the children of the node addressed by `options.path`.
 */
export function listChildren(
  text: string,
  options: Pick<SubtreeOptions, 'pattern' | 'after' | 'last' | 'path'>
): ChildSummary[] {
  return selectSubtree(text, options).children.map((child, index) => ({
    index,
    value: sliceText(text, child.value.text),
    childCount: child.children.length,
  }));
}
