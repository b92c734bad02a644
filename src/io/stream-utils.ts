/**
 * Line-oriented stream processing
 *
 * Aligner output and hit tables are both line-based text, so everything the
 * pipeline reads goes through readLines, whichever source produced it.
 */

import { StreamError } from "../errors";

const MAX_LINE_LENGTH = 1_000_000;

export interface LineProcessingResult {
  lines: string[];
  remainder: string;
}

/**
 * Convert a byte stream to an async iterable of lines
 *
 * Handles chunks that split lines and any of the \n, \r\n and \r line
 * endings. A final line without a terminator is yielded unless it is blank.
 *
 * @throws {StreamError} If reading fails or a line exceeds the maximum length
 * @example
 * ```typescript
 * const stream = await createStream('results.tab');
 * for await (const line of readLines(stream)) {
 *   console.log(line);
 * }
 * ```
 */
export async function* readLines(stream: ReadableStream<Uint8Array>): AsyncIterable<string> {
  const reader = stream.getReader();
  const decoder = new TextDecoder("utf-8");
  let buffer = "";
  let totalBytesProcessed = 0;

  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) break;

      buffer += decoder.decode(value, { stream: true });
      totalBytesProcessed += value.length;

      const result = processBuffer(buffer);
      buffer = result.remainder;
      yield* result.lines;
    }

    buffer += decoder.decode();
    // a trailing "\r" is held back in case "\n" follows in the next chunk
    if (buffer.endsWith("\r")) buffer = buffer.slice(0, -1);
    if (buffer.trim() !== "") {
      yield buffer;
    }
  } catch (error) {
    if (error instanceof StreamError) throw error;
    throw new StreamError(
      `Line reading failed: ${error instanceof Error ? error.message : String(error)}`,
      "read",
      totalBytesProcessed
    );
  } finally {
    reader.releaseLock();
  }
}

/**
 * Split a text buffer into complete lines and an unterminated remainder
 *
 * @throws {StreamError} If a single line exceeds the maximum length
 */
export function processBuffer(buffer: string): LineProcessingResult {
  const lines: string[] = [];
  let lineStart = 0;

  for (let position = 0; position < buffer.length; position++) {
    const char = buffer[position];

    if (char === "\n") {
      const lineEnd = position > 0 && buffer[position - 1] === "\r" ? position - 1 : position;
      lines.push(checkLength(buffer.slice(lineStart, lineEnd)));
      lineStart = position + 1;
    } else if (char === "\r" && position + 1 < buffer.length && buffer[position + 1] !== "\n") {
      lines.push(checkLength(buffer.slice(lineStart, position)));
      lineStart = position + 1;
    }
  }

  return { lines, remainder: checkLength(buffer.slice(lineStart)) };
}

/**
 * Split an in-memory string into lines with the same rules as readLines
 */
export function* splitLines(text: string): Iterable<string> {
  const { lines, remainder } = processBuffer(text);
  yield* lines;
  const last = remainder.endsWith("\r") ? remainder.slice(0, -1) : remainder;
  if (last.trim() !== "") {
    yield last;
  }
}

function checkLength(line: string): string {
  if (line.length > MAX_LINE_LENGTH) {
    throw new StreamError(
      `Line too long: ${line.length} characters exceeds maximum ${MAX_LINE_LENGTH}`,
      "read",
      undefined,
      `Line starts with: ${line.slice(0, 100)}...`
    );
  }
  return line;
}
