/**
 * Output sinks for renderers.
 *
 * Renderers write chunks in traversal order; a Node writable stream satisfies
 * this interface as-is.
 */
export interface OutputSink {
  write(chunk: string): unknown;
}

export interface StringSink extends OutputSink {
  /** Everything written so far. */
  text(): string;
}

export function createStringSink(): StringSink {
  const chunks: string[] = [];
  return {
    write(chunk: string): void {
      chunks.push(chunk);
    },
    text: () => chunks.join(''),
  };
}
