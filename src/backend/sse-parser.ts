/**
 * Incremental Server-Sent Events framing.
 *
 * Feeds arbitrary text chunks in, gets complete `data` payloads out.
 * Events end at a blank line; `\n`, `\r\n` and `\r` line endings are
 * accepted; multi-line `data:` fields are joined with `\n`; comments
 * and fields other than `data` are ignored.
 */
export interface SseParser {
  /** Consume a chunk, returning the payloads of every event it completed. */
  push(chunk: string): string[];
  /** Flush a trailing event the stream closed without terminating. */
  end(): string[];
}

export function createSseParser(): SseParser {
  let buffer = '';
  let dataLines: string[] = [];

  function dispatch(out: string[]): void {
    if (dataLines.length > 0) {
      out.push(dataLines.join('\n'));
    }
    dataLines = [];
  }

  function processLine(line: string, out: string[]): void {
    if (line === '') {
      dispatch(out);
      return;
    }
    if (line.startsWith(':')) return;

    const colon = line.indexOf(':');
    const field = colon === -1 ? line : line.slice(0, colon);
    if (field !== 'data') return;

    let value = colon === -1 ? '' : line.slice(colon + 1);
    if (value.startsWith(' ')) value = value.slice(1);
    dataLines.push(value);
  }

  return {
    push(chunk: string): string[] {
      buffer += chunk;
      const out: string[] = [];

      for (;;) {
        const match = /\r\n|\r|\n/.exec(buffer);
        if (!match) break;
        // A lone trailing \r may be the first half of \r\n.
        if (match[0] === '\r' && match.index === buffer.length - 1) break;
        processLine(buffer.slice(0, match.index), out);
        buffer = buffer.slice(match.index + match[0].length);
      }

      return out;
    },

    end(): string[] {
      const out: string[] = [];
      if (buffer !== '') {
        processLine(buffer, out);
        buffer = '';
      }
      dispatch(out);
      return out;
    },
  };
}
