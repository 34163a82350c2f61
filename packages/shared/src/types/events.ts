/**
 * Base interface for all dump events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the dump run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a dump run starts.
 */
export interface DumpStarted extends BaseEvent {
  type: 'DumpStarted';
  payload: {
    root: string;
    outputPath: string;
    maxDepth: number | null;
  };
}

/** Emitted once the ignore rules are loaded */
export interface RulesLoaded extends BaseEvent {
  type: 'RulesLoaded';
  payload: {
    rulesPath: string;
    /** Whether the rules file was found; false means only built-in rules apply */
    found: boolean;
    ruleCount: number;
  };
}

/** Emitted when a directory below the root cannot be listed */
export interface DirectorySkipped extends BaseEvent {
  type: 'DirectorySkipped';
  payload: {
    relativePath: string;
    reason: string;
  };
}

/** Emitted when a text file cannot be read */
export interface FileReadFailed extends BaseEvent {
  type: 'FileReadFailed';
  payload: {
    relativePath: string;
    reason: string;
  };
}

export interface WalkFinished extends BaseEvent {
  type: 'WalkFinished';
  payload: {
    entryCount: number;
    directories: number;
    textFiles: number;
    opaqueFiles: number;
    readErrors: number;
    decodeErrors: number;
    skippedDirectories: number;
    durationMs: number;
  };
}

export interface ReportWritten extends BaseEvent {
  type: 'ReportWritten';
  payload: {
    outputPath: string;
    bytes: number;
  };
}

export type DumpEvent =
  | DumpStarted
  | RulesLoaded
  | DirectorySkipped
  | FileReadFailed
  | WalkFinished
  | ReportWritten;

export type DumpEventType = DumpEvent['type'];

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common metadata for a new event. Spread into the event literal:
 * `{ ...eventMeta(runId), type: 'DumpStarted', payload }`.
 */
export function eventMeta(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
