import { CoordinateSpan, HitRecord, HyperlinkRequest } from './types.js';
import { splitHitLine } from './hit-line.js';
import { escapeHtml } from './html.js';
import { log } from './log.js';

/**
 * Marks a strategy slot that the installation left empty.
 */
export const NO_STRATEGY = Symbol('no-strategy');
export type NoStrategy = typeof NO_STRATEGY;

/**
 * Builds the whole hit line. Returning undefined hands the hit on to the link strategies.
 */
export type LineStrategy = (request: HyperlinkRequest) => string | undefined;

/**
 * Builds a link target for a hit, or undefined for no link.
 */
export type LinkStrategy = (request: HyperlinkRequest) => string | undefined;

/**
 * Installation-specific hyperlinking, fixed when the resolver is built.
 */
export interface HyperlinkStrategies {
  line: LineStrategy | NoStrategy;
  link: LinkStrategy | NoStrategy;
}

/**
 * Sequence ids worth offering in a single "fetch all" link.
 * Keeps the order in which ids were first added and ignores repeats.
 */
export class RetrievableIds {
  private readonly ids: string[] = [];
  private readonly seen = new Set<string>();

  add(id: string): void {
    if (!id || this.seen.has(id)) {
      return;
    }
    this.seen.add(id);
    this.ids.push(id);
  }

  get size(): number {
    return this.ids.length;
  }

  toArray(): string[] {
    return [...this.ids];
  }
}

function queryValue(values: readonly string[]): string {
  return values.map(value => encodeURIComponent(value)).join('+');
}

/**
 * Path of the retrieval page for the given ids and databases.
 */
export function sequenceRetrievalPath(ids: readonly string[], databases: readonly string[]): string {
  return `/get_sequence/?id=${queryValue(ids)}&db=${queryValue(databases)}`;
}

/**
 * Default link: the retrieval page for this one hit.
 * Hits without an identifier right after `>` get no link.
 */
export const standardSequenceLink: LinkStrategy = request => {
  if (!request.sequenceId) {
    return undefined;
  }
  return sequenceRetrievalPath([request.sequenceId], request.databases);
};

export interface HyperlinkResolverOptions {
  strategies?: Partial<HyperlinkStrategies>;
  /** Fallback used when no link strategy is installed */
  standard?: LinkStrategy;
  /** Prefix for server-relative links, e.g. "/blast" when mounted below the root */
  mountPath?: string;
}

/**
 * Outcome of resolving one hit line.
 */
export interface ResolvedHit {
  /** Line to emit in place of the hit header */
  line: string;
  hit: HitRecord;
}

/**
 * Turns normalized hit headers into linked ones.
 *
 * Strategies are tried in order: the installation's line strategy, then its
 * link strategy, then the standard link. A line strategy that returns a line
 * ends resolution. An installed link strategy is final even when it returns
 * no link.
 */
export class HyperlinkResolver {
  private readonly strategies: HyperlinkStrategies;
  private readonly standard: LinkStrategy;
  private readonly mountPath: string;

  constructor(options: HyperlinkResolverOptions = {}) {
    this.strategies = {
      line: options.strategies?.line ?? NO_STRATEGY,
      link: options.strategies?.link ?? NO_STRATEGY
    };
    this.standard = options.standard ?? standardSequenceLink;
    this.mountPath = (options.mountPath ?? '').replace(/\/+$/, '');
  }

  /**
   * Resolve a normalized hit header line.
   * Ids of linked hits are added to `collected`.
   */
  resolve(
    line: string,
    databases: readonly string[],
    span: CoordinateSpan | undefined,
    collected: RetrievableIds
  ): ResolvedHit {
    const { sequenceId, rest } = splitHitLine(line);
    const request: HyperlinkRequest = {
      sequenceId,
      databases: [...databases],
      hitCoordinates: span ? { ...span } : undefined
    };
    const hit: HitRecord = { rawLine: line, sequenceId, span };

    if (this.strategies.line !== NO_STRATEGY) {
      log.debug('Using custom hyperlinking line creator', request);
      const customLine = this.strategies.line(request);
      if (customLine !== undefined) {
        return { line: customLine, hit };
      }
    }

    let link: string | undefined;
    if (this.strategies.link !== NO_STRATEGY) {
      log.debug('Using custom hyperlink creator', request);
      link = this.strategies.link(request);
    } else {
      log.debug('Using standard hyperlink creator', request);
      link = this.standard(request);
    }

    if (link === undefined) {
      log.debug(`No link added for: '${sequenceId}'`);
      return { line, hit };
    }

    const url = this.url(link);
    log.debug(`Added link for: '${sequenceId}' ${url}`);
    collected.add(sequenceId);
    return {
      line: `><a href='${escapeHtml(url)}' target='_blank'>${sequenceId}</a>${rest}`,
      hit: { ...hit, link: url }
    };
  }

  /**
   * Prefix server-relative links with the mount path; absolute URLs pass through.
   */
  url(link: string): string {
    return link.startsWith('/') ? `${this.mountPath}${link}` : link;
  }
}
