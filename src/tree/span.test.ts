import { describe, expect, it } from 'vitest';
import {
  clampSpan,
  emptySpan,
  relativeOffset,
  shiftSpan,
  sliceText,
  span,
  spanLength,
  spanStop,
  subSpan,
} from './span.js';

describe('span', () => {
  it('rejects a start after the stop', () => {
    expect(() => span(2, 1)).toThrow(RangeError);
  });

  it('keeps an unbounded stop unset', () => {
    expect(span(3)).toEqual({ start: 3 });
    expect(spanStop(span(3), 10)).toBe(10);
    expect(spanLength(span(3), 10)).toBe(7);
  });

  it('builds zero-width spans', () => {
    expect(emptySpan()).toEqual({ start: 0, stop: 0 });
    expect(spanLength(emptySpan(4), 10)).toBe(0);
  });
});

describe('clampSpan', () => {
  it('clamps both ends into the buffer', () => {
    expect(clampSpan({ start: -2, stop: 20 }, 5)).toEqual({ start: 0, stop: 5 });
  });

  it('keeps start <= stop when the span lies past the end', () => {
    expect(clampSpan({ start: 7, stop: 9 }, 5)).toEqual({ start: 5, stop: 5 });
  });
});

describe('subSpan', () => {
  const outer = span(10, 20);

  it('offsets relative to the outer start', () => {
    expect(subSpan(outer, 2, 5)).toEqual({ start: 12, stop: 15 });
  });

  it('clamps to the outer span', () => {
    expect(subSpan(outer, 5, 50)).toEqual({ start: 15, stop: 20 });
    expect(subSpan(outer, -3, 2)).toEqual({ start: 10, stop: 12 });
  });

  it('inherits the outer stop when none is given', () => {
    expect(subSpan(outer, 4)).toEqual({ start: 14, stop: 20 });
    expect(subSpan(span(10), 4)).toEqual({ start: 14 });
  });
});

describe('offset helpers', () => {
  it('shifts both ends', () => {
    expect(shiftSpan(span(1, 3), 4)).toEqual({ start: 5, stop: 7 });
    expect(shiftSpan(span(1), 4)).toEqual({ start: 5 });
  });

  it('converts absolute offsets to line-relative ones', () => {
    expect(relativeOffset(span(10, 20), 13)).toBe(3);
  });

  it('slices the covered text', () => {
    expect(sliceText('hello world', span(6))).toBe('world');
    expect(sliceText('hello world', span(0, 5))).toBe('hello');
  });
});
