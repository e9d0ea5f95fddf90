/**
 * A resource with nothing in it: reads end immediately, writes are discarded.
 */

import type { BufRead, Seek, SeekFrom, Write } from './types.js';

const NOTHING = new Uint8Array(0);

export class Empty implements BufRead, Write, Seek {
  read(_buf: Uint8Array): number {
    return 0;
  }

  write(buf: Uint8Array): number {
    return buf.length;
  }

  flush(): void {
    // nothing buffered
  }

  seek(_pos: SeekFrom): number {
    return 0;
  }

  fillBuf(): Uint8Array {
    return NOTHING;
  }

  consume(_amt: number): void {
    // nothing to advance over
  }
}

export function empty(): Empty {
  return new Empty();
}
