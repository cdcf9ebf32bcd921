import * as test from 'node:test';
import * as assert from 'node:assert';
import { renderReport, queryOpening, QUERY_CLOSING } from '../renderer.js';
import { HyperlinkResolver } from '../hyperlink.js';
import { SAMPLE_REPORT, SAMPLE_REFERENCE, SAMPLE_SUMMARY } from './fixtures/report.js';

const { describe, it } = test;

const HIT_ONE = "><a href='/get_sequence/?id=lcl%7Cseq1&amp;db=genome.fa' target='_blank'>lcl|seq1</a> first hit";
const HIT_TWO = "><a href='/get_sequence/?id=lcl%7Cseq2&amp;db=genome.fa' target='_blank'>lcl|seq2</a> second hit";

function bannerLines(): string[] {
  return ['<HTML>', '<TITLE>t</TITLE>', '<BODY>', '<PRE>', '<b>BLASTN</b>'];
}

describe('renderReport', () => {

  it('should render the sample report', () => {
    const { html } = renderReport(SAMPLE_REPORT, { databases: ['genome.fa'] });

    const body = [
      '',
      '',
      '<div class="resultn" id="query_one">\n<h3>Query= query_one</h3><pre>',
      'Length=40',
      '',
      HIT_ONE,
      'Length=500',
      '',
      'Query  1    ACGT  40',
      'Sbjct  120  ACGT  159',
      '',
      'Query  41   ACGT  60',
      'Sbjct  100  ACGT  119',
      '',
      HIT_TWO,
      'Length=300',
      'Sbjct  5    ACGT  44',
      '',
      '</pre></div>',
      '<div class="resultn" id="query_two">\n<h3>Query= query_two</h3><pre>',
      HIT_ONE,
      'Sbjct  200  ACGT  239',
      '</pre></div>',
      `<pre>${SAMPLE_SUMMARY}\n`,
      '  Database: genome.fa',
      '    Posted date:  Jan 1, 2024',
      'Lambda     K      H',
      '</pre>'
    ];
    const expected = '<h2>Results</h2>' +
      "<a href='/get_sequence/?id=lcl%7Cseq1+lcl%7Cseq2&amp;db=genome.fa'>FASTA of 2 retrievable hit(s)</a>" +
      '<br/><br/>\n' +
      body.join('\n') +
      '\n<br/>' +
      `<pre>${SAMPLE_REFERENCE}</pre>`;

    assert.strictEqual(html, expected);
  });

  it('should report queries in order', () => {
    const { queries } = renderReport(SAMPLE_REPORT, { databases: ['genome.fa'] });
    assert.deepStrictEqual(queries, [
      { ordinal: 1, label: 'query_one' },
      { ordinal: 2, label: 'query_two' }
    ]);
  });

  it('should record each hit with its coordinate span', () => {
    const { hits } = renderReport(SAMPLE_REPORT, { databases: ['genome.fa'] });
    assert.deepStrictEqual(hits.map(hit => [hit.sequenceId, hit.span]), [
      ['lcl|seq1', { min: 100, max: 159 }],
      ['lcl|seq2', { min: 5, max: 44 }],
      ['lcl|seq1', { min: 200, max: 239 }]
    ]);
    assert.strictEqual(hits[1].link, '/get_sequence/?id=lcl%7Cseq2&db=genome.fa');
  });

  it('should collect each linked id once, in order of first appearance', () => {
    const { retrievableIds } = renderReport(SAMPLE_REPORT, { databases: ['genome.fa'] });
    assert.deepStrictEqual(retrievableIds, ['lcl|seq1', 'lcl|seq2']);
  });

  it('should open and close one wrapper per query', () => {
    const { html } = renderReport(SAMPLE_REPORT, { databases: ['genome.fa'] });
    assert.strictEqual(html.match(/<div class="resultn"/g)?.length, 2);
    assert.strictEqual(html.match(/<\/div>/g)?.length, 2);
  });

  it('should close the last query when the report has no database marker', () => {
    const lines = [
      ...bannerLines(),
      'line six',
      ...Array<string>(9).fill('ref'),
      'summary 10 total letters',
      '<b>Query=</b> only',
      'text'
    ];
    const { html, queries } = renderReport(lines, { databases: ['db'] });

    assert.strictEqual(queries.length, 1);
    assert.ok(html.includes(`${queryOpening('only')}\ntext\n${QUERY_CLOSING}\n<br/>`));
    assert.ok(html.startsWith('<h2>Results</h2><br/><br/>\nline six\n'));
  });

  it('should close the injected summary before a query that follows the database marker', () => {
    const lines = [
      ...bannerLines(),
      'x',
      ...Array<string>(9).fill('ref'),
      '10 total letters',
      '<b>Query=</b> early',
      'text early',
      '  Database: d',
      'stats',
      '<b>Query=</b> late',
      'text late'
    ];
    const { html } = renderReport(lines, { databases: ['db'] });

    assert.ok(html.includes(`stats\n</pre>\n${queryOpening('late')}\ntext late\n${QUERY_CLOSING}\n<br/>`));
    assert.strictEqual(html.match(/<pre>/g)?.length, 4);
    assert.strictEqual(html.match(/<\/pre>/g)?.length, 4);
  });

  for (const queryCount of [0, 1, 3]) {
    for (const withMarker of [false, true]) {
      it(`should close each of ${queryCount} query wrappers once ${withMarker ? 'with' : 'without'} a database marker`, () => {
        const lines = [...bannerLines(), 'x', ...Array<string>(9).fill('ref'), '10 total letters'];
        for (let i = 1; i <= queryCount; i++) {
          lines.push(`<b>Query=</b> q${i}`, `text ${i}`);
        }
        if (withMarker) {
          lines.push('  Database: d', 'stats');
        }
        const { html, queries } = renderReport(lines, { databases: ['db'] });

        assert.strictEqual(queries.length, queryCount);
        assert.strictEqual(html.match(/<div class="resultn"/g)?.length ?? 0, queryCount);
        assert.strictEqual(html.match(/<\/div>/g)?.length ?? 0, queryCount);
        assert.strictEqual(html.match(/<\/pre><\/div>/g)?.length ?? 0, queryCount);
      });
    }
  }

  it('should inject the database summary only once', () => {
    const lines = [
      ...bannerLines(),
      '',
      ...Array<string>(9).fill(''),
      'summary 10 total letters',
      '  Database: first',
      '  Database: second'
    ];
    const { html } = renderReport(lines, { databases: ['db'] });

    assert.strictEqual(html.match(/<pre>summary 10 total letters/g)?.length, 1);
    assert.ok(html.includes('<pre>summary 10 total letters\n\n  Database: first\n  Database: second\n</pre>'));
  });

  it('should keep collecting the summary until a total letters line', () => {
    const lines = [
      ...bannerLines(),
      '',
      ...Array<string>(9).fill(''),
      'summary start',
      'still summary',
      '1 sequences; 10 total letters',
      'body text',
      '  Database: x'
    ];
    const { html } = renderReport(lines, { databases: ['db'] });
    assert.ok(html.includes('<pre>summary start\nstill summary\n1 sequences; 10 total letters\n\n  Database: x'));
    assert.ok(html.includes('\nbody text\n'));
  });

  it('should drop closing page tags and the script include', () => {
    const lines = [
      ...bannerLines(),
      '<script src="blastResult.js"></script>kept',
      ...Array<string>(9).fill(''),
      '10 total letters',
      '</PRE>',
      '</BODY>',
      '</HTML>',
      'after'
    ];
    const { html } = renderReport(lines, { databases: ['db'] });
    assert.strictEqual(html, '<h2>Results</h2><br/><br/>\nkept\nafter\n</pre>\n<br/><pre></pre>');
  });

  it('should render an empty report', () => {
    const { html, queries, retrievableIds } = renderReport([], { databases: ['db'] });
    assert.strictEqual(html, '<h2>Results</h2><br/><br/>\n</pre>\n<br/><pre></pre>');
    assert.deepStrictEqual(queries, []);
    assert.deepStrictEqual(retrievableIds, []);
  });

  it('should link hits whose span runs to the end of the report', () => {
    const lines = [
      ...bannerLines(),
      '',
      ...Array<string>(9).fill(''),
      '10 total letters',
      '>orphan<a name="orphan"></a> no footer',
      'Sbjct  7  ACGT  3'
    ];
    const { hits, html } = renderReport(lines, { databases: ['db'] });
    assert.deepStrictEqual(hits[0].span, { min: 3, max: 7 });
    assert.ok(html.includes("><a href='/get_sequence/?id=orphan&amp;db=db' target='_blank'>orphan</a> no footer"));
  });

  it('should prefix links with the mount path', () => {
    const resolver = new HyperlinkResolver({ mountPath: '/blast/' });
    const { html } = renderReport(SAMPLE_REPORT, { databases: ['genome.fa'], resolver });
    assert.ok(html.startsWith(
      "<h2>Results</h2><a href='/blast/get_sequence/?id=lcl%7Cseq1+lcl%7Cseq2&amp;db=genome.fa'>FASTA of 2 retrievable hit(s)</a>"
    ));
    assert.ok(html.includes("<a href='/blast/get_sequence/?id=lcl%7Cseq2&amp;db=genome.fa' target='_blank'>"));
  });

  it('should leave the fetch-all link out when nothing was linked', () => {
    const resolver = new HyperlinkResolver({ strategies: { link: () => undefined } });
    const { html, retrievableIds } = renderReport(SAMPLE_REPORT, { databases: ['genome.fa'], resolver });
    assert.deepStrictEqual(retrievableIds, []);
    assert.ok(html.startsWith('<h2>Results</h2><br/><br/>'));
    assert.ok(html.includes('\n>lcl|seq2 second hit\n'));
  });

  it('should escape query labels used as element ids', () => {
    assert.strictEqual(
      queryOpening('a "quoted" <label>'),
      '<div class="resultn" id="a &quot;quoted&quot; &lt;label&gt;">\n<h3>Query= a "quoted" <label></h3><pre>'
    );
  });
});
