/**
 * Server configuration.
 *
 * Loads a JSON file from $SEQVIEW_CONFIG, or seqview.config.json in the
 * working directory. A missing file means defaults; a malformed one is an error.
 *
 * Example:
 *   {
 *     "port": 4567,
 *     "bin": "/opt/blast/bin",
 *     "numThreads": 4,
 *     "databases": [
 *       { "id": "genome", "name": "/data/db/genome.fa", "title": "Genome", "type": "nucleotide" }
 *     ]
 *   }
 */

import fs from 'fs-extra';
import * as path from 'node:path';
import { ConfigError } from './errors.js';
import { isLogLevel, log, LogLevel } from './log.js';
import { DatabaseEntry, DatabaseType } from './types.js';

export interface AppConfig {
  /** Port to listen on (default: 4567) */
  port: number;
  /** Directory holding the alignment binaries; PATH is searched when absent */
  bin?: string;
  /** Threads given to each alignment run (default: 1) */
  numThreads: number;
  /** Path the app is mounted under, e.g. "/blast" (default: root) */
  mountPath: string;
  logLevel: LogLevel;
  databases: DatabaseEntry[];
}

export const DEFAULT_CONFIG: Readonly<AppConfig> = {
  port: 4567,
  numThreads: 1,
  mountPath: '',
  logLevel: 'info',
  databases: []
};

export function defaultConfigPath(): string {
  return process.env.SEQVIEW_CONFIG ?? path.join(process.cwd(), 'seqview.config.json');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDatabaseType(value: unknown): value is DatabaseType {
  return value === 'nucleotide' || value === 'protein';
}

function positiveInteger(value: unknown, key: string, source: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`"${key}" must be a positive integer`, source);
  }
  return value;
}

function parseDatabase(value: unknown, index: number, source: string): DatabaseEntry {
  if (!isRecord(value)) {
    throw new ConfigError(`databases[${index}] must be an object`, source);
  }
  const { id, name, title, type } = value;
  if (typeof name !== 'string' || name.trim() === '') {
    throw new ConfigError(`databases[${index}].name is required`, source);
  }
  if (/\s/.test(name)) {
    throw new ConfigError(`databases[${index}].name must not contain whitespace`, source);
  }
  if (!isDatabaseType(type)) {
    throw new ConfigError(`databases[${index}].type must be "nucleotide" or "protein"`, source);
  }
  if (id !== undefined && typeof id !== 'string') {
    throw new ConfigError(`databases[${index}].id must be a string`, source);
  }
  if (title !== undefined && typeof title !== 'string') {
    throw new ConfigError(`databases[${index}].title must be a string`, source);
  }
  return {
    id: id ?? name,
    name,
    title: title ?? path.basename(name),
    type
  };
}

/**
 * Validate raw configuration data, filling in defaults.
 */
export function parseConfig(raw: unknown, source = 'configuration'): AppConfig {
  if (!isRecord(raw)) {
    throw new ConfigError('Configuration must be a JSON object', source);
  }

  const config: AppConfig = { ...DEFAULT_CONFIG, databases: [] };

  if (raw.port !== undefined) {
    config.port = positiveInteger(raw.port, 'port', source);
  }
  if (raw.numThreads !== undefined) {
    config.numThreads = positiveInteger(raw.numThreads, 'numThreads', source);
  }
  if (raw.bin !== undefined) {
    if (typeof raw.bin !== 'string') {
      throw new ConfigError('"bin" must be a string', source);
    }
    config.bin = path.resolve(raw.bin);
  }
  if (raw.mountPath !== undefined) {
    if (typeof raw.mountPath !== 'string' || (raw.mountPath !== '' && !raw.mountPath.startsWith('/'))) {
      throw new ConfigError('"mountPath" must be empty or start with "/"', source);
    }
    config.mountPath = raw.mountPath.replace(/\/+$/, '');
  }
  if (raw.logLevel !== undefined) {
    if (!isLogLevel(raw.logLevel)) {
      throw new ConfigError('"logLevel" must be one of debug, info, warn, error', source);
    }
    config.logLevel = raw.logLevel;
  }
  if (raw.databases !== undefined) {
    if (!Array.isArray(raw.databases)) {
      throw new ConfigError('"databases" must be an array', source);
    }
    config.databases = raw.databases.map((entry: unknown, index) => parseDatabase(entry, index, source));
  }

  return config;
}

/**
 * Load configuration from file. PORT in the environment overrides the file's port.
 */
export async function loadConfig(configPath: string = defaultConfigPath()): Promise<AppConfig> {
  let config: AppConfig;

  if (await fs.pathExists(configPath)) {
    let raw: unknown;
    try {
      raw = await fs.readJson(configPath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigError(`Could not read configuration: ${reason}`, configPath);
    }
    config = parseConfig(raw, configPath);
    log.info(`Loaded config from ${configPath}`);
  } else {
    log.warn(`Config file ${configPath} not found, using defaults`);
    config = { ...DEFAULT_CONFIG, databases: [] };
  }

  if (process.env.PORT) {
    config.port = positiveInteger(Number(process.env.PORT), 'PORT', 'environment');
  }
  return config;
}
