export * from './types.js';
export {
  VECTOR_FILE_SCHEMA_ID,
  type RawVector,
  type VectorFileDocument,
  type VectorFileOptions,
} from './schema.js';
export {
  loadVectors,
  normalizeIdArgs,
  parseExpectedTag,
  parseVectorFile,
  selectVectorsById,
} from './loader.js';
