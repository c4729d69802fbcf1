// NDJSON (Newline Delimited JSON) helpers
// Used for record logs and for ndjson table artifacts

/**
 * A line of NDJSON content with its position in the source.
 */
export type NdjsonLine = {
  /** 1-based line number */
  line: number;

  /** Byte offset of the first character of the line */
  offset: number;

  /** Raw line text without the trailing newline */
  text: string;
};

/**
 * Stringify a single item as an NDJSON line (for appending)
 */
export function stringifyNdjsonLine<T>(item: T): string {
  return JSON.stringify(item) + '\n';
}

/**
 * Split a byte stream into non-empty NDJSON lines, tracking byte offsets.
 * Lines are yielded unparsed so callers can report a bad line and keep going.
 */
export async function* readNdjsonLines(
  chunks: AsyncIterable<Uint8Array>
): AsyncGenerator<NdjsonLine> {
  const decoder = new TextDecoder();
  let buffer = new Uint8Array(0);
  let bufferOffset = 0;
  let lineNumber = 0;

  for await (const chunk of chunks) {
    const merged = new Uint8Array(buffer.length + chunk.length);
    merged.set(buffer);
    merged.set(chunk, buffer.length);
    buffer = merged;

    let start = 0;
    let newline = buffer.indexOf(0x0a, start);
    while (newline !== -1) {
      lineNumber++;
      const text = decoder.decode(buffer.subarray(start, newline)).replace(/\r$/, '');
      if (text.trim()) {
        yield { line: lineNumber, offset: bufferOffset + start, text };
      }
      start = newline + 1;
      newline = buffer.indexOf(0x0a, start);
    }

    buffer = buffer.slice(start);
    bufferOffset += start;
  }

  // Process any remaining content after the last newline
  if (buffer.length > 0) {
    lineNumber++;
    const text = decoder.decode(buffer).replace(/\r$/, '');
    if (text.trim()) {
      yield { line: lineNumber, offset: bufferOffset, text };
    }
  }
}
