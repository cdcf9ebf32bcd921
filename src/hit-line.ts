/**
 * Hit header normalization.
 *
 * The alignment tool's HTML output may already carry an empty named anchor on
 * each hit header. Where it sits depends on how the database was built, so
 * each placement has its own rule. Both rules leave `>` followed directly by
 * the identifier and the rest of the line, ready to be linked again.
 */

/**
 * A named rewrite for one known anchor placement.
 */
export interface HitLineRule {
  name: string;
  pattern: RegExp;
  /** Rebuild the line from the pattern's match */
  rewrite: (match: RegExpMatchArray) => string;
}

/**
 * Database built with identifier parsing: the anchor trails the identifier.
 * `>lcl|seq1<a name="seq1"></a> description` → `>lcl|seq1 description`
 */
export const trailingAnchorRule: HitLineRule = {
  name: 'trailing-anchor',
  pattern: /^>([^<]+)<a\b[^>]*><\/a>(.*)$/,
  rewrite: match => `>${match[1]}${match[2]}`
};

/**
 * Database built without identifier parsing: the anchor leads the line.
 * `><a name="seq1"></a>lcl|seq1 description` → `>lcl|seq1 description`
 */
export const leadingAnchorRule: HitLineRule = {
  name: 'leading-anchor',
  pattern: /^><a\b[^>]*><\/a>(.*)$/,
  rewrite: match => `>${match[1]}`
};

export const HIT_LINE_RULES: readonly HitLineRule[] = [trailingAnchorRule, leadingAnchorRule];

/**
 * Strip a known anchor shape from a hit header line.
 * Lines matching neither shape are returned unchanged.
 */
export function normalizeHitLine(line: string): string {
  for (const rule of HIT_LINE_RULES) {
    const match = line.match(rule.pattern);
    if (match) {
      return rule.rewrite(match);
    }
  }
  return line;
}

/**
 * Split a normalized hit header into its identifier and whatever follows it.
 * The identifier is the run of non-space characters right after `>`; it is
 * empty when a space follows `>` directly.
 */
export function splitHitLine(line: string): { sequenceId: string; rest: string } {
  const match = line.match(/^>(\S*)(.*)$/);
  if (!match) {
    return { sequenceId: '', rest: line };
  }
  return { sequenceId: match[1], rest: match[2] };
}
