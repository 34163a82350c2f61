import { normalizePath, type OpaqueConfig } from '@treedump/shared';
import { PathMatcher, type IgnoreRuleSet } from '../ignore/matcher';
import { OpaqueFilePolicy, type OpaqueReason } from './opaque';

export type Classification = 'ignored' | 'directory' | 'text-file' | 'opaque-file';

export type PathKind = 'directory' | 'file';

export type ClassificationReason =
  | { type: 'rule'; rule: string }
  | { type: 'own-output'; path: string }
  | { type: 'opaque'; by: OpaqueReason };

export interface ClassificationDetail {
  classification: Classification;
  /** Set for ignored and opaque paths */
  reason?: ClassificationReason;
}

export interface ClassifierOptions {
  rules: IgnoreRuleSet;
  /**
   * Root-relative paths the tool itself writes (the report, the event log).
   * They are always ignored.
   */
  selfPaths?: readonly string[];
  opaque?: Partial<OpaqueConfig>;
}

export class Classifier {
  private readonly matcher: PathMatcher;
  private readonly selfPaths: Set<string>;
  private readonly opaque: OpaqueFilePolicy;

  constructor(options: ClassifierOptions) {
    this.matcher = new PathMatcher(options.rules);
    this.selfPaths = new Set((options.selfPaths ?? []).map(normalizePath));
    this.opaque = new OpaqueFilePolicy(options.opaque);
  }

  classify(relativePath: string, kind: PathKind): Classification {
    return this.explain(relativePath, kind).classification;
  }

  explain(relativePath: string, kind: PathKind): ClassificationDetail {
    const normalized = normalizePath(relativePath);

    // 1. Ignore rules
    const rule = this.matcher.firstMatch(normalized);
    if (rule) {
      return { classification: 'ignored', reason: { type: 'rule', rule: rule.source } };
    }

    // 2. Our own output
    if (this.selfPaths.has(normalized)) {
      return { classification: 'ignored', reason: { type: 'own-output', path: normalized } };
    }

    if (kind === 'directory') {
      return { classification: 'directory' };
    }

    // 3. Opaque by extension or name
    const opaqueReason = this.opaque.reason(normalized);
    if (opaqueReason) {
      return { classification: 'opaque-file', reason: { type: 'opaque', by: opaqueReason } };
    }

    return { classification: 'text-file' };
  }
}
