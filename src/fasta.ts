/**
 * Preparing submitted query text for an alignment run.
 */

const DAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];
const MONTHS = [
  'January', 'February', 'March', 'April', 'May', 'June',
  'July', 'August', 'September', 'October', 'November', 'December'
];

// Header token: ">" and the identifier up to the first whitespace
const HEADER_PATTERN = /^>\S+/gm;

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Label for a query submitted without a header, e.g.
 * "Submitted at 09:05, Monday, January 15, 2024" (local time).
 */
export function submissionLabel(now: Date): string {
  const time = `${pad2(now.getHours())}:${pad2(now.getMinutes())}`;
  const day = DAYS[now.getDay()];
  const month = MONTHS[now.getMonth()];
  return `Submitted at ${time}, ${day}, ${month} ${pad2(now.getDate())}, ${now.getFullYear()}`;
}

/**
 * Make sure every submitted sequence has a unique identifier.
 *
 * Leading whitespace is dropped and a header is added when the text does not
 * start with one. A header token seen before gets `_1`, `_2`, ... appended
 * on its second, third, ... appearance.
 */
export function toFasta(sequence: string, now: Date = new Date()): string {
  let fasta = sequence.trimStart();
  if (!fasta.startsWith('>')) {
    fasta = `>${submissionLabel(now)}\n${fasta}`;
  }

  const occurrences = new Map<string, number>();
  return fasta.replace(HEADER_PATTERN, header => {
    const count = occurrences.get(header);
    if (count === undefined) {
      occurrences.set(header, 1);
      return header;
    }
    occurrences.set(header, count + 1);
    return `${header}_${count}`;
  });
}

/**
 * Header tokens of a FASTA text, in order.
 */
export function fastaHeaders(fasta: string): string[] {
  return fasta.match(HEADER_PATTERN) ?? [];
}

/**
 * Number of FASTA entries: lines starting with ">".
 */
export function countFastaEntries(fasta: string): number {
  return (fasta.match(/^>/gm) ?? []).length;
}
