/**
 * Errors raised while resolving paths or selecting output options.
 *
 * - `code`: stable identifier for programmatic handling.
 * - `message`: human-readable description.
 *
 * Parsing and rendering never throw; every code here comes from caller input.
 */
export type SubtreeErrorCode =
  | 'PATH_OUT_OF_RANGE'
  | 'PATH_NOT_FOUND'
  | 'BAD_PATH_COMPONENT'
  | 'UNKNOWN_THEME'
  | 'INVALID_PATTERN';

export class SubtreeError extends Error {
  readonly code: SubtreeErrorCode;

  constructor(code: SubtreeErrorCode, message: string) {
    super(message);
    this.name = 'SubtreeError';
    this.code = code;
  }
}

/**
 * A text path component matched none of the children.
 *
 * `available` lists every sibling value at that level, in order.
 */
export class PathNotFoundError extends SubtreeError {
  readonly component: string;
  readonly available: string[];

  constructor(component: string, available: string[]) {
    super(
      'PATH_NOT_FOUND',
      `No child matches ${JSON.stringify(component)}; available: ${available.join(' ')}`
    );
    this.name = 'PathNotFoundError';
    this.component = component;
    this.available = available;
  }
}

export function isSubtreeError(error: unknown): error is SubtreeError {
  return error instanceof SubtreeError;
}
