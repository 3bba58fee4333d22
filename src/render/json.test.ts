import { describe, expect, it } from 'vitest';
import { parseTree } from '../tree/build.js';
import type { TreeNode } from '../tree/model.js';
import { parsePath, resolvePath } from '../tree/path.js';
import { renderJson, toJsonTree } from './json.js';
import { createStringSink } from './sink.js';

function json(text: string, node: TreeNode, showRoot: boolean): string {
  const sink = createStringSink();
  renderJson(text, node, showRoot, sink);
  return sink.text();
}

describe('renderJson', () => {
  const dotted = '.\n  a\n    b\n      c\n      d\n    e\n  f\n';
  const dot = resolvePath(dotted, parseTree(dotted), parsePath(['0']));

  it('emits the bare child array when the start node is hidden', () => {
    expect(json(dotted, dot, false)).toBe('[{"a":[{"b":["c","d"]},"e"]},"f"]');
  });

  it('wraps the children in an object keyed by the start value when shown', () => {
    expect(json(dotted, dot, true)).toBe('{".":[{"a":[{"b":["c","d"]},"e"]},"f"]}');
  });

  it('serializes the synthetic root the same way', () => {
    const text = 'a\n  b\n    c\n    d\n  e\nf\n';
    expect(json(text, parseTree(text), false)).toBe('[{"a":[{"b":["c","d"]},"e"]},"f"]');
    expect(json(text, parseTree(text), true)).toBe('{"":[{"a":[{"b":["c","d"]},"e"]},"f"]}');
  });

  it('escapes quotes and control characters', () => {
    const text = 'x\ty\nsay "hi"\n';
    expect(json(text, parseTree(text), false)).toBe('["x\\ty","say \\"hi\\""]');
  });

  it('handles trees without children', () => {
    expect(json('', parseTree(''), false)).toBe('[]');
    expect(json('', parseTree(''), true)).toBe('""');
  });
});

describe('toJsonTree', () => {
  it('keeps a leaf as its value', () => {
    const text = 'leaf\n';
    const leaf = parseTree(text).children[0];
    if (!leaf) throw new Error('missing leaf');
    expect(toJsonTree(text, leaf)).toBe('leaf');
  });

  it('keeps sibling order and duplicate values', () => {
    const text = 'k\n  v\n  v\n  w\n';
    expect(toJsonTree(text, parseTree(text))).toEqual({ '': [{ k: ['v', 'v', 'w'] }] });
  });
});
