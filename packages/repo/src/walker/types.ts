import type { DecodeErrorsMode, Logger, OpaqueConfig } from '@treedump/shared';
import type { IgnoreRuleSet } from '../ignore/matcher';
import type { ContentStatus } from '../content/reader';

export interface DirectoryEntry {
  kind: 'directory';
  /** Slash-separated, relative to the traversal root */
  relativePath: string;
}

export interface FileEntry {
  kind: 'file';
  relativePath: string;
  /** The decoded text, or a placeholder explaining why it is absent */
  content: string;
  contentStatus: ContentStatus;
}

export type Entry = DirectoryEntry | FileEntry;

export interface WalkStats {
  directories: number;
  textFiles: number;
  opaqueFiles: number;
  readErrors: number;
  decodeErrors: number;
  /** Directories below the root that could not be listed */
  skippedDirectories: number;
}

export interface WalkResult {
  /** Absolute traversal root */
  root: string;
  entries: Entry[];
  warnings: string[];
  stats: WalkStats;
}

export interface WalkOptions {
  /** Defaults to the built-in `.git/` rule alone */
  rules?: IgnoreRuleSet;
  /** Deepest directory level to emit; the root is level 0. Unbounded when omitted. */
  maxDepth?: number;
  /** The report path (absolute or root-relative); never walked */
  outputPath?: string;
  /** The event log path, if any; never walked */
  logPath?: string;
  /** Directory names removed before classification, in addition to `.git` */
  excludeDirs?: readonly string[];
  opaque?: Partial<OpaqueConfig>;
  decodeErrors?: DecodeErrorsMode;
  /** Correlates emitted events with one dump run */
  runId?: string;
}

export interface DirentLike {
  name: string;
  isDirectory(): boolean;
  isFile(): boolean;
  isSymbolicLink(): boolean;
}

export interface StatsLike {
  isDirectory(): boolean;
  isFile(): boolean;
}

/**
 * The filesystem operations the walker needs.
 */
export interface WalkFs {
  readdir(path: string): Promise<DirentLike[]>;
  stat(path: string): Promise<StatsLike>;
  readFile(path: string): Promise<Buffer>;
}

export interface WalkerDeps {
  fs?: WalkFs;
  logger?: Logger;
}
