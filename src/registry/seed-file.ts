/**
 * Seed file loader
 *
 * The seed file is a JSON array of project definitions (or an object with a
 * `projects` array). Definitions are validated later by the registry.
 */

import { existsSync, readFileSync } from 'fs';
import { resolve } from 'path';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export function loadProjectDefinitions(filePath: string): unknown[] {
  const fullPath = resolve(process.cwd(), filePath);

  if (!existsSync(fullPath)) {
    logger.info({ path: fullPath }, 'No project seed file found');
    return [];
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(fullPath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Project seed file is not valid JSON: ${fullPath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  if (Array.isArray(parsed)) {
    return parsed;
  }

  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'projects' in parsed &&
    Array.isArray(parsed.projects)
  ) {
    return parsed.projects;
  }

  throw new ValidationError(`Project seed file must hold an array of projects: ${fullPath}`);
}
