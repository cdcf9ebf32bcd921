import * as test from 'node:test';
import * as assert from 'node:assert';
import { splitSections, splitReportLines, ClassifiedLine } from '../parser.js';
import { ReportSection } from '../types.js';
import { SAMPLE_REPORT } from './fixtures/report.js';

const { describe, it } = test;

function targets(lines: ClassifiedLine[]): string {
  return lines.map(line => line.target[0]).join('');
}

describe('splitSections', () => {

  it('should classify the sample report', () => {
    const lines = [...splitSections(SAMPLE_REPORT)];

    assert.strictEqual(lines.length, SAMPLE_REPORT.length);
    // d = discard, b = body, r = reference, s = summary
    assert.strictEqual(targets(lines.slice(0, 18)), 'dddddbrrrrrrrrrssb');
    assert.ok(lines.slice(17).every(line => line.target === 'body' && line.section === ReportSection.Body));
  });

  it('should send line 6 to the body while reading the reference block', () => {
    const lines = [...splitSections(SAMPLE_REPORT)];
    assert.strictEqual(lines[5].lineNumber, 6);
    assert.strictEqual(lines[5].target, 'body');
    assert.strictEqual(lines[5].section, ReportSection.Reference);
    assert.strictEqual(lines[6].target, 'reference');
  });

  it('should never move back to an earlier section', () => {
    const order = [ReportSection.Banner, ReportSection.Reference, ReportSection.DatabaseSummary, ReportSection.Body];
    const sections = [...splitSections(SAMPLE_REPORT)].map(line => order.indexOf(line.section));
    for (let i = 1; i < sections.length; i++) {
      assert.ok(sections[i] >= sections[i - 1], `line ${i + 1} went back`);
    }
  });

  it('should keep reading the summary until a total letters line', () => {
    const report = [
      ...Array<string>(15).fill('x'),
      'Database: a',
      'Database: b',
      '  2 sequences; 99 total letters',
      'total letters again'
    ];
    const lines = [...splitSections(report)];
    assert.deepStrictEqual(lines.slice(15).map(line => line.target), ['summary', 'summary', 'summary', 'body']);
  });

  it('should treat everything after line 15 as summary when there is no total letters line', () => {
    const lines = [...splitSections([...Array<string>(15).fill(''), 'a', 'b'])];
    assert.deepStrictEqual(lines.slice(15).map(line => line.target), ['summary', 'summary']);
  });

  it('should handle reports shorter than the banner', () => {
    const lines = [...splitSections(['one', 'two'])];
    assert.deepStrictEqual(lines.map(line => line.target), ['discard', 'discard']);
  });
});

describe('splitReportLines', () => {

  it('should normalize line endings', () => {
    assert.deepStrictEqual(splitReportLines('a\r\nb\rc\n'), ['a', 'b', 'c']);
  });

  it('should keep blank lines inside the report', () => {
    assert.deepStrictEqual(splitReportLines('a\n\nb'), ['a', '', 'b']);
    assert.deepStrictEqual(splitReportLines(''), []);
  });
});
