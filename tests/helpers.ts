/**
 * Shared test fixtures and helpers.
 */

import { Cursor } from '../src/io/cursor.js';
import type { BufRead, Seek, SeekFrom, Write } from '../src/io/types.js';

/** A cursor that records the name of every method called on it. */
export class RecordingResource implements BufRead, Write, Seek {
  readonly calls: string[] = [];
  readonly cursor: Cursor;

  constructor(data?: Uint8Array) {
    this.cursor = new Cursor(data);
  }

  read(buf: Uint8Array): number {
    this.calls.push('read');
    return this.cursor.read(buf);
  }

  write(buf: Uint8Array): number {
    this.calls.push('write');
    return this.cursor.write(buf);
  }

  flush(): void {
    this.calls.push('flush');
  }

  seek(pos: SeekFrom): number {
    this.calls.push('seek');
    return this.cursor.seek(pos);
  }

  fillBuf(): Uint8Array {
    this.calls.push('fillBuf');
    return this.cursor.fillBuf();
  }

  consume(amt: number): void {
    this.calls.push('consume');
    this.cursor.consume(amt);
  }
}

/** Write-only sink; has no read or seek. */
export class CollectingSink implements Write {
  readonly chunks: Uint8Array[] = [];

  write(buf: Uint8Array): number {
    this.chunks.push(buf.slice());
    return buf.length;
  }

  flush(): void {
    // nothing buffered
  }

  text(): string {
    return this.chunks.map((c) => new TextDecoder().decode(c)).join('');
  }
}

export function bytes(text: string): Uint8Array {
  return new TextEncoder().encode(text);
}

export function createBufferOutput() {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => lines.push(s) },
    lines,
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
