/**
 * render.ts - Renders a saved alignment report (the tool's -html output) to a page fragment
 *
 * Useful for checking how a report from a new tool version comes out without
 * running a search through the server.
 *
 * Usage: npx tsx scripts/render.ts <report.html> <database> [database...]
 * Output: Writes <report>.rendered.html next to the input
 */

import * as fs from 'node:fs';
import { splitReportLines } from '../src/parser.js';
import { renderReport } from '../src/renderer.js';

function main() {
    const args = process.argv.slice(2);

    if (args.length < 2) {
        console.error('Usage: npx tsx scripts/render.ts <report.html> <database> [database...]');
        process.exit(1);
    }

    const [inputFile, ...databases] = args;

    if (!fs.existsSync(inputFile)) {
        console.error(`File not found: ${inputFile}`);
        process.exit(1);
    }

    const lines = splitReportLines(fs.readFileSync(inputFile, 'utf-8'));
    const result = renderReport(lines, { databases });

    const outputFile = inputFile.replace(/(\.html?)?$/, '.rendered.html');
    fs.writeFileSync(outputFile, result.html, 'utf-8');
    console.log(`Rendered report written: ${outputFile}`);

    // Report what was found
    console.log(`${result.queries.length} queries, ${result.hits.length} hits`);
    console.log(`${result.retrievableIds.length} retrievable ids`);
    const unlinked = result.hits.filter(hit => hit.link === undefined).length;
    if (unlinked > 0) {
        console.log(`${unlinked} hits left without a link`);
    }
}

main();
