/**
 * Project Registry Module
 */

export {
  ProjectRegistry,
  type RegistryChange,
  type RegistryListener,
  type SeedResult,
} from './registry.js';

export { loadProjectDefinitions } from './seed-file.js';

export {
  projectInputSchema,
  projectPatchSchema,
  extractionRulesSchema,
  parseOrThrow,
  slugify,
  PROJECT_ID_PATTERN,
} from './schema.js';
