/**
 * Splits a byte stream into newline-delimited lines, one at a time, without
 * reading ahead of what the consumer asks for. A trailing line with no
 * newline is yielded at end of stream.
 */
export async function* readLines(source: AsyncIterable<Uint8Array>): AsyncGenerator<string, void, undefined> {
  const decoder = new TextDecoder();
  let buffer = '';

  for await (const bytes of source) {
    buffer += decoder.decode(bytes, { stream: true });

    let newline = buffer.indexOf('\n');
    while (newline >= 0) {
      yield buffer.slice(0, newline);
      buffer = buffer.slice(newline + 1);
      newline = buffer.indexOf('\n');
    }
  }

  buffer += decoder.decode();
  if (buffer) yield buffer;
}
