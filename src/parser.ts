import { ReportLine, ReportSection } from './types.js';

/**
 * Where a report line ends up in the rewritten document.
 * - discard: dropped (banner)
 * - reference: collected and shown after the results
 * - summary: collected and shown where the database summary marker appears
 * - body: rewritten in place
 */
export type LineTarget = 'discard' | 'reference' | 'summary' | 'body';

/**
 * A report line with the section the splitter was in when it read it.
 */
export interface ClassifiedLine extends ReportLine {
  section: ReportSection;
  target: LineTarget;
}

/**
 * Fixed layout of the report's opening lines (1-based, inclusive)
 */
export const BANNER_LAST_LINE = 5;
export const REFERENCE_FIRST_LINE = 7;
export const REFERENCE_LAST_LINE = 15;

// Last line of the database summary, e.g. "     1,234 sequences; 5,678,901 total letters"
const SUMMARY_END_PATTERN = /total letters/;

interface Transition {
  target: LineTarget;
  next: ReportSection;
}

type TransitionFn = (line: ReportLine) => Transition;

/**
 * One transition function per section. Each decides where the line goes and
 * which section the next line is read in.
 */
const TRANSITIONS: Record<ReportSection, TransitionFn> = {
  [ReportSection.Banner]: line => {
    if (line.lineNumber <= BANNER_LAST_LINE) {
      return { target: 'discard', next: ReportSection.Banner };
    }
    return TRANSITIONS[ReportSection.Reference](line);
  },

  // Line 6 is read here but is not part of the reference block; it goes to the body.
  [ReportSection.Reference]: line => {
    if (line.lineNumber < REFERENCE_FIRST_LINE) {
      return { target: 'body', next: ReportSection.Reference };
    }
    if (line.lineNumber <= REFERENCE_LAST_LINE) {
      return { target: 'reference', next: ReportSection.Reference };
    }
    return TRANSITIONS[ReportSection.DatabaseSummary](line);
  },

  // The "total letters" line is the summary's last
  [ReportSection.DatabaseSummary]: line => {
    const finished = SUMMARY_END_PATTERN.test(line.text);
    return { target: 'summary', next: finished ? ReportSection.Body : ReportSection.DatabaseSummary };
  },

  [ReportSection.Body]: () => {
    return { target: 'body', next: ReportSection.Body };
  }
};

/**
 * Section a line belongs to. Body lines read before the body proper (line 6)
 * report the section the splitter moved on to.
 */
function sectionOf(target: LineTarget, next: ReportSection): ReportSection {
  switch (target) {
    case 'discard':
      return ReportSection.Banner;
    case 'reference':
      return ReportSection.Reference;
    case 'summary':
      return ReportSection.DatabaseSummary;
    case 'body':
      return next;
  }
}

/**
 * Split report text into lines, normalizing line endings.
 * A trailing newline does not produce an empty last line.
 */
export function splitReportLines(report: string): string[] {
  const lines = report.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
  if (lines.length > 0 && lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/**
 * Walk the report once, classifying each line.
 *
 * The first five lines are the banner, lines 7 to 15 the reference block, and
 * the lines after that up to and including the first "total letters" line the
 * database summary. Everything else is body.
 */
export function* splitSections(lines: readonly string[]): Generator<ClassifiedLine> {
  let section = ReportSection.Banner;

  for (let i = 0; i < lines.length; i++) {
    const line: ReportLine = { lineNumber: i + 1, text: lines[i] };
    const { target, next } = TRANSITIONS[section](line);
    section = next;
    yield { ...line, section: sectionOf(target, next), target };
  }
}
