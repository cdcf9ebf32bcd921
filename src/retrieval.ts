import { RetrievalRequest, RetrievalResult } from './types.js';
import { SequenceFetcher } from './blast.js';
import { countFastaEntries } from './fasta.js';
import { escapeHtml } from './html.js';
import { log } from './log.js';

/**
 * Sequences returned by one database
 */
export interface FetchedSequences {
  database: string;
  sequences: string;
}

/**
 * Build a retrieval request from the space separated `id` and `db` parameters.
 * Repeated ids are dropped (a multi-query run can report the same hit more
 * than once); databases are kept as given.
 */
export function parseRetrievalRequest(idParam: string, dbParam: string): RetrievalRequest {
  const ids = idParam.split(/\s+/).filter(id => id.length > 0);
  const databases = dbParam.split(/\s+/).filter(db => db.length > 0);
  return { sequenceIds: [...new Set(ids)], databases };
}

/**
 * Combine what each database returned. Empty results are skipped.
 */
export function reconcileRetrieval(
  request: RetrievalRequest,
  fetched: readonly FetchedSequences[]
): RetrievalResult {
  let sequences = '';
  for (const { database, sequences: found } of fetched) {
    if (found.length === 0) {
      log.debug(`'${request.sequenceIds.join(', ')}' not found in ${database}`);
      continue;
    }
    sequences += found;
  }
  return { sequences, foundCount: countFastaEntries(sequences) };
}

/**
 * Look the requested ids up in every requested database, one fetch per database.
 * A hit does not record which database it came from, so all are searched.
 */
export async function retrieveSequences(
  request: RetrievalRequest,
  fetcher: SequenceFetcher
): Promise<RetrievalResult> {
  log.info(`Looking for: '${request.sequenceIds.join(', ')}' in '${request.databases.join(', ')}'`);

  const fetched: FetchedSequences[] = [];
  for (const database of request.databases) {
    const sequences = await fetcher.fetch(request.sequenceIds, database);
    fetched.push({ database, sequences });
  }
  return reconcileRetrieval(request, fetched);
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Explanation shown when the number of sequences found differs from the number requested.
 */
export function renderCountMismatch(request: RetrievalRequest, result: RetrievalResult): string {
  const requested = request.sequenceIds.length;
  const direction = result.foundCount > requested ? 'more' : 'less';
  const ids = escapeHtml(request.sequenceIds.join(', '));
  const databases = escapeHtml(request.databases.join(', '));

  return `<h1>ERROR: incorrect number of sequences found.</h1>
<p>Dear user,</p>

<p><strong>We have found
<em>${direction}</em>
sequences than expected.</strong></p>

<p>This is likely due to a problem with how databases are formatted.
<strong>Please share this text with the person managing this website so
they can resolve the issue.</strong></p>

<p> You requested ${plural(requested, 'sequence')}
with the following identifiers: <code>${ids}</code>,
from the following databases: <code>${databases}</code>.
But we found ${plural(result.foundCount, 'sequence')}.
</p>

<p>If sequences were retrieved, you can find them below (but some may be incorrect, so be careful!).</p>
<hr/>
`;
}

/**
 * Render a retrieval: the mismatch explanation when counts differ, then the sequences.
 */
export function renderRetrieval(request: RetrievalRequest, result: RetrievalResult): string {
  let out = '';
  if (result.foundCount !== request.sequenceIds.length) {
    out += renderCountMismatch(request, result);
  }
  out += `<pre><code>${escapeHtml(result.sequences)}</code></pre>`;
  return out;
}
