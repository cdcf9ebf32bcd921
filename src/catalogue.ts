import { DatabaseEntry, DatabaseType } from './types.js';

/**
 * The databases a server offers, indexed for the search form and request handling.
 */
export interface DatabaseCatalogue {
  /** Lookup by the id the search form submits */
  byId: Map<string, DatabaseEntry>;
  /** Databases grouped by molecule type, in configuration order */
  byType: Record<DatabaseType, DatabaseEntry[]>;
  /** Problems found while building the catalogue */
  errors: string[];
}

/**
 * Build a catalogue from configured databases.
 * When two entries share an id the first one is kept.
 */
export function buildCatalogue(entries: readonly DatabaseEntry[]): DatabaseCatalogue {
  const byId = new Map<string, DatabaseEntry>();
  const byType: Record<DatabaseType, DatabaseEntry[]> = { nucleotide: [], protein: [] };
  const errors: string[] = [];

  for (const entry of entries) {
    if (byId.has(entry.id)) {
      errors.push(`Duplicate database id "${entry.id}" (${entry.name}); keeping the first`);
      continue;
    }
    byId.set(entry.id, entry);
    byType[entry.type].push(entry);
  }

  return { byId, byType, errors };
}
