/**
 * Half-open ranges over the input buffer.
 *
 * Every node keeps spans rather than copied strings, so all offset arithmetic
 * lives here as named operations:
 * - absolute offsets index the whole buffer
 * - relative offsets index from the start of an enclosing span (usually a line)
 *
 * Spans are never mutated; every helper returns a new one.
 */
export interface Span {
  /** Inclusive start offset. */
  readonly start: number;
  /** Exclusive stop offset; `undefined` means "to the end of the buffer". */
  readonly stop?: number;
}

/**
 * Build a span, rejecting `start > stop`.
 */
export function span(start: number, stop?: number): Span {
  if (stop !== undefined && start > stop) {
    throw new RangeError(`Invalid span: start ${start} is after stop ${stop}`);
  }
  return stop === undefined ? { start } : { start, stop };
}

/** Zero-width span at `offset`. */
export function emptySpan(offset = 0): Span {
  return { start: offset, stop: offset };
}

/**
 * Resolve an unbounded stop against a buffer length.
 */
export function spanStop(value: Span, length: number): number {
  return value.stop ?? length;
}

export function spanLength(value: Span, length: number): number {
  return Math.max(0, spanStop(value, length) - value.start);
}

/**
 * Clamp both ends into `[0, length]`, keeping `start <= stop`.
 */
export function clampSpan(value: Span, length: number): Span {
  const stop = Math.min(Math.max(spanStop(value, length), 0), length);
  const start = Math.min(Math.max(value.start, 0), stop);
  return { start, stop };
}

/**
 * Sub-range of `outer` using offsets relative to `outer.start`.
 *
 * The result never leaves `outer`: offsets past its stop are clamped to it and
 * negative offsets to its start.
 */
export function subSpan(outer: Span, relativeStart: number, relativeStop?: number): Span {
  const start = clampInto(outer, outer.start + relativeStart);
  if (relativeStop === undefined) return outer.stop === undefined ? { start } : { start, stop: outer.stop };
  const stop = clampInto(outer, outer.start + relativeStop);
  return { start, stop: Math.max(start, stop) };
}

function clampInto(outer: Span, offset: number): number {
  const low = Math.max(offset, outer.start);
  return outer.stop === undefined ? low : Math.min(low, outer.stop);
}

/** Move a span by `delta` characters. */
export function shiftSpan(value: Span, delta: number): Span {
  return value.stop === undefined
    ? { start: value.start + delta }
    : { start: value.start + delta, stop: value.stop + delta };
}

/**
 * Offset of `offset` relative to the start of `outer`.
 */
export function relativeOffset(outer: Span, offset: number): number {
  return offset - outer.start;
}

/**
 * Read the text a span covers.
 */
export function sliceText(text: string, value: Span): string {
  return text.slice(value.start, value.stop);
}
