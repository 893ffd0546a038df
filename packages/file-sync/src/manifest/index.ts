export { ManifestReader } from './manifest-reader.js';
export { parseManifest, resolveEntries, joinUrl } from './manifest-parser.js';
export type { ManifestEntry, ResolvedManifestEntry } from './types.js';
