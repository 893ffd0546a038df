export { ContentHasher } from './content-hasher.js';
export type { HashMap } from './content-hasher.js';
export { hashFile, hashBuffer } from './file-hasher.js';
export {
  nativeHashCommand,
  parseNativeDigest,
  hashFileNative,
  defaultExecFile,
} from './native-hasher.js';
export { HASH_CHUNK_SIZE } from './types.js';
export type {
  HashStrategy,
  FileHashResult,
  ExecFileFn,
  NativeHashCommand,
  ContentHasherOptions,
} from './types.js';
