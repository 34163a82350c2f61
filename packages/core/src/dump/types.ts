import type { DumpConfig } from '@treedump/shared';
import type { LoadedRules, WalkResult } from '@treedump/repo';

export interface DumpRequest {
  /** Traversal root; relative paths resolve against the process cwd */
  root: string;
  config: DumpConfig;
  /** Walk and report counts without writing the report */
  dryRun?: boolean;
  runId?: string;
}

export interface DumpOutcome {
  runId: string;
  root: string;
  outputPath: string;
  rules: LoadedRules;
  result: WalkResult;
  /** Set when the report was written */
  written?: { path: string; bytes: number };
  durationMs: number;
}
