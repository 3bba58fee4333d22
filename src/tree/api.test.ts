import { describe, expect, it } from 'vitest';
import { createStringSink } from '../render/sink.js';
import { catchError } from '../testing/helpers.js';
import {
  listChildren,
  renderSubtree,
  renderSubtreeToString,
  selectTheme,
  shouldShowRoot,
} from './api.js';

const text = 'a\n  b\n    c\n  d\ne\n';

describe('shouldShowRoot', () => {
  it('hides the root without a path', () => {
    expect(shouldShowRoot({})).toBe(false);
    expect(shouldShowRoot({ path: [] })).toBe(false);
  });

  it('shows the root when a path is given', () => {
    expect(shouldShowRoot({ path: ['a'] })).toBe(true);
  });

  it('lets an explicit choice win', () => {
    expect(shouldShowRoot({ path: ['a'], root: 'hide' })).toBe(false);
    expect(shouldShowRoot({ root: 'show' })).toBe(true);
  });
});

describe('renderSubtree', () => {
  it('reproduces the input by default', () => {
    expect(renderSubtreeToString(text, {})).toBe(text);
  });

  it('selects a subtree and shows it by default', () => {
    expect(renderSubtreeToString(text, { path: ['a', 'b'] })).toBe('b\n  c\n');
    expect(renderSubtreeToString(text, { path: ['a', 'b'], root: 'hide' })).toBe('c\n');
  });

  it('draws themed output only for plain format', () => {
    expect(renderSubtreeToString(text, { theme: { kind: 'preset', name: 'ascii' } })).toBe(
      ['|-- a', '|   |-- b', '|   |   `-- c', '|   `-- d', '`-- e', ''].join('\n')
    );
    expect(
      renderSubtreeToString(text, {
        format: 'json',
        theme: { kind: 'glyphs', glyphs: ['1', '2', '3', '4'] },
      })
    ).toBe('[{"a":[{"b":["c"]},"d"]},"e"]');
  });

  it('prints index paths', () => {
    expect(renderSubtreeToString(text, { format: 'indices', path: ['0', '1'] })).toBe('  d\n');
  });

  it('appends a newline to JSON only for interactive output', () => {
    expect(renderSubtreeToString(text, { format: 'json', path: ['e'] })).toBe('"e"');
    expect(renderSubtreeToString(text, { format: 'json', path: ['e'], interactive: true })).toBe(
      '"e"\n'
    );
  });

  it('applies caller patterns', () => {
    const bullets = '- a\n  - b\n- c\n';
    expect(renderSubtreeToString(bullets, { format: 'json' })).toBe('[{"- a":["- b"]},"- c"]');
    expect(renderSubtreeToString(bullets, { format: 'json', pattern: '- ', after: true })).toBe(
      '[{"a":["b"]},"c"]'
    );
  });

  it('writes nothing when the path does not resolve', () => {
    const sink = createStringSink();
    const error = catchError(() => renderSubtree(text, { path: ['a', 'z'] }, sink));
    expect(error).toMatchObject({ code: 'PATH_NOT_FOUND', available: ['b', 'd'] });
    expect(sink.text()).toBe('');
  });

  it('rejects unknown themes before parsing', () => {
    const error = catchError(() =>
      renderSubtreeToString(text, { theme: { kind: 'preset', name: 'nope' } })
    );
    expect(error).toMatchObject({ code: 'UNKNOWN_THEME' });
  });
});

describe('selectTheme', () => {
  it('resolves presets and literal glyphs', () => {
    expect(selectTheme({ kind: 'preset', name: 'tab' })).toEqual(['\t', '\t', '\t', '\t']);
    expect(selectTheme({ kind: 'glyphs', glyphs: ['a', 'b', 'c', 'd'] })).toEqual([
      'a',
      'b',
      'c',
      'd',
    ]);
  });
});

describe('listChildren', () => {
  it('summarizes the children at a path', () => {
    expect(listChildren(text, { path: ['a'] })).toEqual([
      { index: 0, value: 'b', childCount: 1 },
      { index: 1, value: 'd', childCount: 0 },
    ]);
  });

  it('lists top-level nodes without a path', () => {
    expect(listChildren(text, {}).map((child) => child.value)).toEqual(['a', 'e']);
  });
});
