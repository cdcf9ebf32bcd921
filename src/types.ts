/**
 * A single line of an alignment report.
 * Reports are read once and never modified in place.
 */
export interface ReportLine {
  /** Line number in the report (1-based) */
  readonly lineNumber: number;

  /** Line text without its terminator */
  readonly text: string;
}

/**
 * The part of the report a line belongs to.
 * A report moves through these in order and never goes back; Body is terminal.
 */
export enum ReportSection {
  Banner = 'Banner',
  Reference = 'Reference',
  DatabaseSummary = 'DatabaseSummary',
  Body = 'Body'
}

/**
 * One query's block of results, opened by a "Query=" marker.
 */
export interface QueryBlock {
  /** Position of the query in the report (1-based) */
  ordinal: number;

  /** Free text following the "Query=" marker */
  label: string;
}

/**
 * Lowest and highest subject positions covered by a hit's alignment rows.
 */
export interface CoordinateSpan {
  min: number;
  max: number;
}

/**
 * A hit header line with what was learned about it while rewriting.
 */
export interface HitRecord {
  /** The header line as it appeared in the report */
  rawLine: string;

  /** Token following the leading ">" */
  sequenceId: string;

  /** Subject coordinates, when the hit has any Sbjct rows */
  span?: CoordinateSpan;

  /** Link target, when one of the strategies produced one */
  link?: string;
}

/**
 * Everything a hyperlink strategy gets to look at.
 */
export interface HyperlinkRequest {
  readonly sequenceId: string;

  /** Databases the alignment was run against, in the order they were given */
  readonly databases: readonly string[];

  readonly hitCoordinates?: Readonly<CoordinateSpan>;
}

/**
 * A batch sequence retrieval, as requested through the fetch link.
 */
export interface RetrievalRequest {
  /** Requested ids, de-duplicated, in the order they were first given */
  sequenceIds: string[];

  /** Databases to look in; not de-duplicated */
  databases: string[];
}

/**
 * What came back from a batch retrieval.
 */
export interface RetrievalResult {
  /** FASTA text of every found sequence, concatenated */
  sequences: string;

  /** Number of FASTA headers in `sequences` */
  foundCount: number;
}

/**
 * Molecule type of a sequence database.
 */
export type DatabaseType = 'nucleotide' | 'protein';

/**
 * A database known to the server, as listed in the configuration.
 */
export interface DatabaseEntry {
  /** Identifier used by the search form */
  id: string;

  /** Database path or name handed to the alignment tools */
  name: string;

  /** Human-friendly title */
  title: string;

  type: DatabaseType;
}
