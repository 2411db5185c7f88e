/**
 * Parser/Extractor Module
 */

export {
  extractFields,
  computeDedupKey,
  buildRecord,
  type FieldExtraction,
  type BuildRecordInput,
} from './extractor.js';

export { cleanValue, collapseWhitespace, parseKeyValueLines, toSnakeCase } from './transforms.js';
