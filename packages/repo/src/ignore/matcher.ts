import picomatch from 'picomatch';
import { normalizePath, segments } from '@treedump/shared';

/**
 * Ordered ignore patterns, as loaded from a rules file.
 * A pattern ending in `/` is a directory-only rule; anything else is a glob.
 */
export type IgnoreRuleSet = readonly string[];

export interface CompiledRule {
  /** The pattern exactly as it appeared in the rule set */
  readonly source: string;
  readonly kind: 'directory' | 'glob';
  test(normalizedPath: string): boolean;
}

// `*` crosses `/` (bash), and braces, extglobs and a leading `!` stay literal.
const GLOB_OPTIONS = {
  bash: true,
  dot: true,
  nobrace: true,
  noextglob: true,
  nonegate: true,
} as const;

export function compileRule(source: string): CompiledRule | undefined {
  const pattern = source.trim();
  if (!pattern) {
    return undefined;
  }

  if (pattern.endsWith('/')) {
    // Exact segment equality anywhere in the path, not gitignore anchoring.
    const base = pattern.replace(/\/+$/, '');
    return {
      source,
      kind: 'directory',
      test: (p) => segments(p).some((part) => part === base),
    };
  }

  const isMatch = picomatch(pattern, GLOB_OPTIONS);
  return {
    source,
    kind: 'glob',
    test: (p) => isMatch(p),
  };
}

/**
 * A rule set compiled once and evaluated in order, first match wins.
 */
export class PathMatcher {
  private readonly compiled: CompiledRule[];

  constructor(rules: IgnoreRuleSet) {
    this.compiled = [];
    for (const rule of rules) {
      const compiled = compileRule(rule);
      if (compiled) {
        this.compiled.push(compiled);
      }
    }
  }

  get size(): number {
    return this.compiled.length;
  }

  matches(path: string): boolean {
    return this.firstMatch(path) !== undefined;
  }

  /**
   * Returns the first rule that matches `path`, or `undefined`.
   */
  firstMatch(path: string): CompiledRule | undefined {
    const normalized = normalizePath(path);
    return this.compiled.find((rule) => rule.test(normalized));
  }
}

export function compileRules(rules: IgnoreRuleSet): PathMatcher {
  return new PathMatcher(rules);
}

/**
 * One-shot form of {@link PathMatcher.matches}. Prefer {@link compileRules} in loops.
 */
export function shouldIgnore(path: string, rules: IgnoreRuleSet): boolean {
  return compileRules(rules).matches(path);
}
