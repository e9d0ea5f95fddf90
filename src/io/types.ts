/**
 * Capability interfaces for synchronous I/O resources.
 *
 * A resource implements only the capabilities it actually has. Optional
 * members fall back to the implementations in `defaults.ts`.
 */

export interface Read {
  /** Reads into `buf`, returning the number of bytes read (0 at end of stream). */
  read(buf: Uint8Array): number;
  readVectored?(bufs: Uint8Array[]): number;
  readToEnd?(): Uint8Array;
  readToString?(): string;
  readExact?(buf: Uint8Array): void;
}

export interface Write {
  /** Writes some prefix of `buf`, returning how many bytes were accepted. */
  write(buf: Uint8Array): number;
  flush(): void;
  writeVectored?(bufs: Uint8Array[]): number;
  writeAll?(buf: Uint8Array): void;
  writeFmt?(format: string, ...args: unknown[]): void;
}

export type SeekFrom =
  | { readonly kind: 'start'; readonly offset: number }
  | { readonly kind: 'end'; readonly offset: number }
  | { readonly kind: 'current'; readonly offset: number };

export const SeekFrom = Object.freeze({
  start: (offset: number): SeekFrom => ({ kind: 'start', offset }),
  end: (offset: number): SeekFrom => ({ kind: 'end', offset }),
  current: (offset: number): SeekFrom => ({ kind: 'current', offset }),
});

export interface Seek {
  /** Moves the cursor and returns the new absolute position. */
  seek(pos: SeekFrom): number;
  rewind?(): void;
  streamPosition?(): number;
  seekRelative?(offset: number): void;
}

export interface BufRead extends Read {
  /**
   * Returns the buffered bytes, reading more from the source when the buffer
   * is empty. An empty result means end of stream.
   */
  fillBuf(): Uint8Array;
  /** Marks `amt` buffered bytes as used. Never blocks. */
  consume(amt: number): void;
}
