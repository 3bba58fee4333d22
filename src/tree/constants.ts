/**
 * Constants shared by the scanner, the renderers and the CLI.
 */

/**
 * Default "value start" pattern.
 *
 * Matches end of line, or the first character that is neither whitespace nor a
 * box-drawing character (U+2500..U+257F). This covers plain indentation as well
 * as trees that were already drawn with box glyphs.
 */
export const DEFAULT_VALUE_PATTERN = /[^\s\u2500-\u257F]|$/;

/** Line terminator searched for by the scanner. */
export const LINE_TERMINATOR = '\n';

/** Width each path index is right-justified to by the index renderer. */
export const INDEX_FIELD_WIDTH = 3;

/** Separator between the index column and the value when the path is empty. */
export const INDEX_SEPARATOR_EMPTY = '  ';

/** Separator between the index column and the value. */
export const INDEX_SEPARATOR = '   ';

/** Leading character that forces a path component to be read as text. */
export const PATH_TEXT_ESCAPE = '\\';

export const SUBTREE_VERSION = '0.1.0';
