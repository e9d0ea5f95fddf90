export { SeekFrom } from './types.js';
export type { Read, Write, Seek, BufRead } from './types.js';
export { Empty, empty } from './empty.js';
export { Cursor, resolveSeek } from './cursor.js';
export { BufReader, bufReader, DEFAULT_BUF_SIZE } from './buf-reader.js';
export { FileStream } from './file.js';
export {
  readVectored,
  readToEnd,
  readToString,
  readExact,
  writeVectored,
  writeAll,
  writeFmt,
  rewind,
  streamPosition,
  seekRelative,
} from './defaults.js';
