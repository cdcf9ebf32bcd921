import { execFile } from 'node:child_process';
import * as path from 'node:path';
import { log } from './log.js';
import { splitReportLines } from './parser.js';

/**
 * Alignment programs the server will run
 */
export const BLAST_METHODS = ['blastn', 'blastp', 'blastx', 'tblastn', 'tblastx'] as const;

export type BlastMethod = typeof BLAST_METHODS[number];

export function isBlastMethod(value: string): value is BlastMethod {
  return BLAST_METHODS.some(method => method === value);
}

export interface AlignmentJob {
  method: BlastMethod;
  /** FASTA query text */
  query: string;
  /** Database names, in the order given by the user */
  databases: readonly string[];
  /** Extra command-line options, space separated */
  options: string;
}

export type AlignmentRun =
  | { success: true; command: string; lines: string[] }
  | { success: false; command: string; status: number; message: string };

/**
 * Runs an alignment and hands back its HTML report line by line.
 */
export interface AlignmentRunner {
  run(job: AlignmentJob): Promise<AlignmentRun>;
}

/**
 * Looks sequences up by id in one database. Returns FASTA text, empty when nothing was found.
 */
export interface SequenceFetcher {
  fetch(sequenceIds: readonly string[], database: string): Promise<string>;
}

export interface BlastCommandOptions {
  /** Directory holding the alignment binaries; PATH is searched when absent */
  binDir?: string;
  /** Largest report accepted from the tool, in bytes */
  maxBuffer?: number;
}

const DEFAULT_MAX_BUFFER = 256 * 1024 * 1024;

function resolveBinary(name: string, binDir?: string): string {
  return binDir ? path.join(binDir, name) : name;
}

function splitOptions(options: string): string[] {
  return options.split(/\s+/).filter(option => option.length > 0);
}

/**
 * Runs the alignment tools as child processes, feeding the query on stdin.
 */
export class BlastCommandRunner implements AlignmentRunner {
  constructor(private readonly options: BlastCommandOptions = {}) {}

  run(job: AlignmentJob): Promise<AlignmentRun> {
    const binary = resolveBinary(job.method, this.options.binDir);
    const args = ['-db', job.databases.join(' '), '-html', ...splitOptions(job.options)];
    const command = [binary, ...args].join(' ');

    return new Promise(resolve => {
      const child = execFile(
        binary,
        args,
        { encoding: 'utf8', maxBuffer: this.options.maxBuffer ?? DEFAULT_MAX_BUFFER },
        (error, stdout, stderr) => {
          if (error) {
            const message = stderr.trim() || error.message;
            resolve({ success: false, command, status: 500, message });
            return;
          }
          resolve({ success: true, command, lines: splitReportLines(stdout) });
        }
      );
      // The tool can exit before reading all of the query; its exit status is reported by the callback
      child.stdin?.on('error', error => {
        log.debug(`Query not fully written to ${job.method}: ${error.message}`);
      });
      child.stdin?.end(job.query);
    });
  }
}

/**
 * Fetches sequences with the database command-line tool.
 */
export class BlastdbcmdFetcher implements SequenceFetcher {
  constructor(private readonly options: BlastCommandOptions = {}) {}

  fetch(sequenceIds: readonly string[], database: string): Promise<string> {
    const binary = resolveBinary('blastdbcmd', this.options.binDir);
    const args = ['-db', database, '-entry', sequenceIds.join(',')];

    return new Promise((resolve, reject) => {
      execFile(
        binary,
        args,
        { encoding: 'utf8', maxBuffer: this.options.maxBuffer ?? DEFAULT_MAX_BUFFER },
        (error, stdout) => {
          if (error && 'code' in error && typeof error.code === 'string') {
            // The binary itself could not be started
            reject(error);
            return;
          }
          // Ids missing from this database make the tool exit non-zero; whatever it found is still printed
          resolve(stdout);
        }
      );
    });
  }
}
