export { parseWorld } from './world-parser';
export { serializeWorld } from './world-serializer';
export { loadWorldFile, saveWorldFile } from './world-file';
export { LineReader, WorldFormatError } from './line-reader';
