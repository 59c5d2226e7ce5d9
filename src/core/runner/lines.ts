import { isRecord } from '../utils/json-file.js';

/**
 * Incremental newline splitter for subprocess output. Chunks may end
 * mid-line; the remainder is held until the next chunk or `flush()`.
 */
export class LineSplitter {
  private pending = '';

  push(chunk: string): string[] {
    const text = this.pending + chunk;
    const parts = text.split('\n');
    this.pending = parts.pop() ?? '';
    return parts.map(stripCarriageReturn);
  }

  /** Returns the trailing partial line, if any, and resets. */
  flush(): string | undefined {
    const rest = stripCarriageReturn(this.pending);
    this.pending = '';
    return rest.length > 0 ? rest : undefined;
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/** Parses one line as a JSON object; `undefined` when it is not one. */
export function parseJsonObject(line: string): Record<string, unknown> | undefined {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return undefined;
  }
  return isRecord(data) ? data : undefined;
}
