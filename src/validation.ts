import { BlastMethod, isBlastMethod } from './blast.js';
import { DatabaseCatalogue } from './catalogue.js';
import { RequestError } from './errors.js';
import { DatabaseEntry } from './types.js';

/**
 * A validated search submission
 */
export interface SearchParams {
  method: BlastMethod;
  sequence: string;
  databases: DatabaseEntry[];
  advanced: string;
}

// Options the server sets itself when running an alignment
export const RESERVED_OPTIONS = ['-out', '-html', '-outfmt', '-db', '-query'];

const ADVANCED_OPTIONS_PATTERN = /^[a-z0-9\-_. ']*$/i;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function stringList(value: unknown): string[] | undefined {
  if (typeof value === 'string') {
    return [value];
  }
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  return undefined;
}

/**
 * Check user-supplied alignment options.
 * Throws with the reason when they contain unexpected characters or an option the server sets.
 */
export function validateAdvancedOptions(advanced: string): void {
  if (!ADVANCED_OPTIONS_PATTERN.test(advanced)) {
    throw new RequestError('Invalid characters detected in the advanced options');
  }
  const lowered = advanced.toLowerCase();
  for (const option of RESERVED_OPTIONS) {
    if (lowered.includes(option)) {
      throw new RequestError(
        `The advanced BLAST option "${option}" is used internally and so cannot be specified by you`
      );
    }
  }
}

/**
 * Validate a search submission (form fields or JSON body).
 */
export function validateSearchParams(body: unknown, catalogue: DatabaseCatalogue): SearchParams {
  const params = isRecord(body) ? body : {};
  const { method, sequence, advanced } = params;

  if (typeof method !== 'string' || method === '') {
    throw new RequestError('No BLAST method provided.');
  }
  if (typeof sequence !== 'string' || sequence.trim() === '') {
    throw new RequestError('No input sequence provided.');
  }
  const databaseIds = stringList(params.databases);
  if (!databaseIds || databaseIds.length === 0) {
    throw new RequestError('No BLAST database provided.');
  }
  if (!isBlastMethod(method)) {
    throw new RequestError(`Unknown BLAST method: ${method}.`);
  }

  const databases: DatabaseEntry[] = [];
  for (const id of databaseIds) {
    const entry = catalogue.byId.get(id);
    if (!entry) {
      throw new RequestError(`Unknown BLAST database: ${id}.`);
    }
    databases.push(entry);
  }

  let advancedOptions = '';
  if (typeof advanced === 'string') {
    advancedOptions = advanced;
  } else if (advanced !== undefined) {
    throw new RequestError('Advanced parameters invalid: must be text');
  }
  try {
    validateAdvancedOptions(advancedOptions);
  } catch (error) {
    if (error instanceof RequestError) {
      throw new RequestError(`Advanced parameters invalid: ${error.message}`);
    }
    throw error;
  }

  return { method, sequence, databases, advanced: advancedOptions };
}

/**
 * Command-line options for a run: the user's, plus the task for plain blastn
 * (unless the user chose one) and the thread count.
 */
export function buildAlignmentOptions(method: BlastMethod, advanced: string, numThreads: number): string {
  const options = [advanced.trim()];
  if (method === 'blastn' && !/task/.test(advanced)) {
    options.push('-task blastn');
  }
  options.push(`-num_threads ${numThreads}`);
  return options.filter(option => option.length > 0).join(' ');
}
