/**
 * Command line parsing
 */

import { ValidationError } from './utils/errors.js';
import type { ScrapeStore } from './store/types.js';

export type Mode =
  | { kind: 'service' }
  | { kind: 'run'; projectId: string; maxPages?: number }
  | { kind: 'export'; projectId: string; format: string; out?: string };

function optionValue(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  const inline = args.find((arg) => arg.startsWith(prefix));
  if (inline) {
    return inline.slice(prefix.length);
  }
  const index = args.indexOf(`--${name}`);
  const next = index >= 0 ? args[index + 1] : undefined;
  return next && !next.startsWith('--') ? next : undefined;
}

export function parseArgs(args: string[]): Mode {
  const runId = optionValue(args, 'run');
  if (args.includes('--run') || runId) {
    if (!runId) {
      throw new ValidationError('--run needs a project id');
    }
    const rawMaxPages = optionValue(args, 'max-pages');
    const maxPages = rawMaxPages === undefined ? undefined : Number(rawMaxPages);
    if (maxPages !== undefined && (!Number.isInteger(maxPages) || maxPages <= 0)) {
      throw new ValidationError('--max-pages must be a positive integer');
    }
    return { kind: 'run', projectId: runId, maxPages };
  }

  const exportId = optionValue(args, 'export');
  if (args.includes('--export') || exportId) {
    if (!exportId) {
      throw new ValidationError('--export needs a project id');
    }
    return {
      kind: 'export',
      projectId: exportId,
      format: optionValue(args, 'format') ?? 'json',
      out: optionValue(args, 'out'),
    };
  }

  return { kind: 'service' };
}

/**
 * One-shot modes against the in-memory store: an export would always be
 * empty, and a run's records are gone when the process exits. Throws for
 * the first, returns a warning for the second.
 */
export function checkStore(mode: Mode, kind: ScrapeStore['kind']): string | null {
  if (kind !== 'memory') {
    return null;
  }
  if (mode.kind === 'export') {
    throw new ValidationError('--export needs DATABASE_URL: the in-memory store starts empty');
  }
  if (mode.kind === 'run') {
    return 'DATABASE_URL is not set: records from this run are discarded on exit';
  }
  return null;
}
