import { Chalk } from 'chalk';
import { SubtreeError } from '../tree/errors.js';

/**
 * Branch glyph themes.
 *
 * A theme is indexed by the themed renderer's slot flags:
 * - 0: branch to a child with siblings below
 * - 1: vertical continuation past a shown descendant
 * - 2: branch to the last child
 * - 3: blank continuation under the last child
 */
export type Theme = readonly [mid: string, vertical: string, last: string, blank: string];

const BOX_THEMES = {
  ascii: ['|-- ', '|   ', '`-- ', '    '],
  single: ['├── ', '│   ', '└── ', '    '],
  double: ['╠══ ', '║   ', '╚══ ', '    '],
  round: ['├── ', '│   ', '╰── ', '    '],
  heavy: ['┣━━ ', '┃   ', '┗━━ ', '    '],
} as const satisfies Record<string, Theme>;

const INDENT_THEMES = {
  space1: [' ', ' ', ' ', ' '],
  space2: ['  ', '  ', '  ', '  '],
  space4: ['    ', '    ', '    ', '    '],
  space8: ['        ', '        ', '        ', '        '],
  tab: ['\t', '\t', '\t', '\t'],
} as const satisfies Record<string, Theme>;

const DARK_THEME_PREFIX = 'dark-';

// Dark glyphs are an explicit choice, so styling does not depend on the terminal.
const darkStyle = new Chalk({ level: 1 });

function darken(theme: Theme): Theme {
  const [mid, vertical, last, blank] = theme.map((glyph) => darkStyle.dim(glyph));
  return [mid ?? '', vertical ?? '', last ?? '', blank ?? ''];
}

function buildThemeRegistry(): ReadonlyMap<string, Theme> {
  const registry = new Map<string, Theme>();
  for (const [name, theme] of Object.entries(BOX_THEMES)) registry.set(name, theme);
  for (const [name, theme] of Object.entries(INDENT_THEMES)) registry.set(name, theme);
  for (const [name, theme] of Object.entries(BOX_THEMES)) {
    registry.set(`${DARK_THEME_PREFIX}${name}`, darken(theme));
  }
  return registry;
}

/** Built once at load and never mutated. */
export const THEMES: ReadonlyMap<string, Theme> = buildThemeRegistry();

export function themeNames(): string[] {
  return [...THEMES.keys()];
}

export function getTheme(name: string): Theme {
  const theme = THEMES.get(name);
  if (!theme) {
    throw new SubtreeError(
      'UNKNOWN_THEME',
      `Unknown theme: ${JSON.stringify(name)} (available: ${themeNames().join(', ')})`
    );
  }
  return theme;
}

/**
 * Build a theme from four caller-supplied glyphs.
 */
export function themeFromGlyphs(glyphs: readonly string[]): Theme {
  const [mid, vertical, last, blank] = glyphs;
  if (
    glyphs.length !== 4 ||
    mid === undefined ||
    vertical === undefined ||
    last === undefined ||
    blank === undefined
  ) {
    throw new SubtreeError('UNKNOWN_THEME', `Expected 4 glyphs, got ${glyphs.length}`);
  }
  return [mid, vertical, last, blank];
}
