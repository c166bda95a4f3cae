/**
 * Output sinks for the layout state: an in-memory buffer for in-place
 * rewrites and a line-by-line writer for streaming to stdout.
 */

/** Anything with a Node-style `write(chunk)`, e.g. `process.stdout`. */
export interface OutputStream {
  write(chunk: string): boolean;
}

export interface Sink {
  write(text: string): void;
  /** Push out anything still held back. Called once at the end of a run. */
  flush(): void;
  /** Text accumulated for the caller; empty for streaming sinks. */
  contents(): string;
}

export class BufferSink implements Sink {
  private readonly chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  flush(): void {}

  contents(): string {
    return this.chunks.join('');
  }
}

/**
 * Forwards complete lines only, so a run that fails mid-line never leaves a
 * partial line on the stream.
 */
export class StreamSink implements Sink {
  private pending = '';

  constructor(private readonly stream: OutputStream) {}

  write(text: string): void {
    const combined = this.pending + text;
    const lastNewline = combined.lastIndexOf('\n');
    if (lastNewline === -1) {
      this.pending = combined;
      return;
    }
    this.stream.write(combined.slice(0, lastNewline + 1));
    this.pending = combined.slice(lastNewline + 1);
  }

  flush(): void {
    if (this.pending) {
      this.stream.write(this.pending);
      this.pending = '';
    }
  }

  contents(): string {
    return '';
  }
}
