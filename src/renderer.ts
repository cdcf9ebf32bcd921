import { HitRecord, QueryBlock } from './types.js';
import { splitSections } from './parser.js';
import { normalizeHitLine } from './hit-line.js';
import { scanHitCoordinates } from './coordinates.js';
import { HyperlinkResolver, RetrievableIds, sequenceRetrievalPath } from './hyperlink.js';
import { escapeHtml } from './html.js';

/**
 * Options for rendering an alignment report
 */
export interface RenderOptions {
  /** Database names the alignment was run against */
  databases: readonly string[];
  /** Hyperlinking for hit lines (default: standard links, no mount path) */
  resolver?: HyperlinkResolver;
}

/**
 * Result of rendering an alignment report
 */
export interface RenderResult {
  /** The rendered HTML fragment */
  html: string;
  /** Queries in the order their blocks were opened */
  queries: QueryBlock[];
  /** Every hit header seen in the body */
  hits: HitRecord[];
  /** Ids offered through the "fetch all" link */
  retrievableIds: string[];
}

// Closing tags the alignment tool writes at the end of its own page
const DROPPED_LINE_PATTERNS = [/^<\/BODY>/, /^<\/HTML>/, /^<\/PRE>/];

const SCRIPT_INCLUDE_PATTERN = /^<script src="blastResult.js"><\/script>/;

const QUERY_PATTERN = /^<b>Query=<\/b> (.*)/;

const DATABASE_MARKER_PATTERN = /^ {2}Database: /;

/**
 * Opening markup for a query block
 */
export function queryOpening(label: string): string {
  return `<div class="resultn" id="${escapeHtml(label)}">\n<h3>Query= ${label}</h3><pre>`;
}

export const QUERY_CLOSING = '</pre></div>';

/**
 * Link to the FASTA of every retrievable hit, or an empty string when there are none
 */
export function fetchAllLink(
  ids: readonly string[],
  databases: readonly string[],
  resolver: HyperlinkResolver
): string {
  if (ids.length === 0) {
    return '';
  }
  const href = escapeHtml(resolver.url(sequenceRetrievalPath(ids, databases)));
  return `<a href='${href}'>FASTA of ${ids.length} retrievable hit(s)</a>`;
}

/**
 * Rewrite an alignment report (HTML output of the alignment tool) into a
 * browsable fragment.
 *
 * Each query's results are wrapped in their own block, hit headers are linked,
 * the database summary is moved to the end of the alignments and the
 * reference block to the end of the page. Reports that lack the expected
 * markers render without the corresponding parts.
 */
export function renderReport(lines: readonly string[], options: RenderOptions): RenderResult {
  const resolver = options.resolver ?? new HyperlinkResolver();
  const databases = options.databases;

  const body: string[] = [];
  const reference: string[] = [];
  const summary: string[] = [];
  const queries: QueryBlock[] = [];
  const hits: HitRecord[] = [];
  const collected = new RetrievableIds();
  let queryOpen = false;
  let summaryOpen = false;
  let finishedAlignments = false;

  for (const { lineNumber, text, target } of splitSections(lines)) {
    if (target === 'discard') {
      continue;
    }
    if (target === 'reference') {
      reference.push(text);
      continue;
    }
    if (target === 'summary') {
      summary.push(text);
      continue;
    }

    if (DROPPED_LINE_PATTERNS.some(pattern => pattern.test(text))) {
      continue;
    }

    const line = text.replace(SCRIPT_INCLUDE_PATTERN, '');

    if (line.startsWith('>')) {
      const normalized = normalizeHitLine(line);
      const span = scanHitCoordinates(lines, lineNumber);
      const resolved = resolver.resolve(normalized, databases, span, collected);
      hits.push({ ...resolved.hit, rawLine: text });
      body.push(resolved.line);
      continue;
    }

    const queryMatch = line.match(QUERY_PATTERN);
    if (queryMatch) {
      const label = queryMatch[1];
      if (queryOpen) {
        body.push(QUERY_CLOSING);
      }
      if (summaryOpen) {
        body.push('</pre>');
        summaryOpen = false;
      }
      queries.push({ ordinal: queries.length + 1, label });
      body.push(queryOpening(label));
      queryOpen = true;
      continue;
    }

    if (DATABASE_MARKER_PATTERN.test(line) && !finishedAlignments) {
      if (queryOpen) {
        body.push(QUERY_CLOSING);
        queryOpen = false;
      }
      body.push(`<pre>${summary.join('\n')}\n`);
      summaryOpen = true;
      finishedAlignments = true;
    }

    body.push(line);
  }

  body.push(queryOpen ? QUERY_CLOSING : '</pre>');

  const retrievableIds = collected.toArray();
  const html = [
    '<h2>Results</h2>',
    fetchAllLink(retrievableIds, databases, resolver),
    '<br/><br/>\n',
    body.join('\n'),
    '\n<br/>',
    `<pre>${reference.join('\n').trim()}</pre>`
  ].join('');

  return { html, queries, hits, retrievableIds };
}
