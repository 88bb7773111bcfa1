/**
 * Base interface for all harness events.
 * All events include common metadata fields.
 */
export interface BaseEvent {
  /** Schema version for event format compatibility */
  schemaVersion: number;
  /** ISO 8601 timestamp when the event occurred */
  timestamp: string;
  /** Unique identifier for the verification run */
  runId: string;
  /** Event type discriminator */
  type: string;
}

/**
 * Emitted when a verification run starts.
 */
export interface RunStarted extends BaseEvent {
  type: 'RunStarted';
  payload: {
    /** Cross-compilation target applied to every check */
    target: string;
    /** Root of the library-under-test */
    libraryRoot: string;
  };
}

/** Emitted once the scratch workspace directory exists */
export interface WorkspaceCreated extends BaseEvent {
  type: 'WorkspaceCreated';
  payload: {
    workspaceDir: string;
  };
}

/** Emitted after the template archive has been extracted */
export interface TemplateFetched extends BaseEvent {
  type: 'TemplateFetched';
  payload: {
    url: string;
    version: string;
  };
}

/** Emitted after template-owned paths were removed */
export interface TemplatePruned extends BaseEvent {
  type: 'TemplatePruned';
  payload: {
    removed: string[];
  };
}

export interface DependenciesInjected extends BaseEvent {
  type: 'DependenciesInjected';
  payload: {
    library: { name: string; path: string };
    framework: { name: string; version: string };
  };
}

export interface ExamplesLinked extends BaseEvent {
  type: 'ExamplesLinked';
  payload: {
    strategy: 'symlink' | 'copy';
    source: string;
  };
}

export interface ExampleCheckStarted extends BaseEvent {
  type: 'ExampleCheckStarted';
  payload: {
    example: string;
    /** 1-based position in the run order */
    index: number;
    total: number;
  };
}

export interface ExampleCheckFinished extends BaseEvent {
  type: 'ExampleCheckFinished';
  payload: {
    example: string;
    exitCode: number;
    durationMs: number;
  };
}

/**
 * Emitted when the pipeline finishes, before the workspace is removed.
 */
export interface RunFinished extends BaseEvent {
  type: 'RunFinished';
  payload: {
    status: 'success' | 'failure';
    checked: string[];
    durationMs: number;
    error?: string;
  };
}

export interface WorkspaceRemoved extends BaseEvent {
  type: 'WorkspaceRemoved';
  payload: {
    workspaceDir: string;
  };
}

/**
 * Union of all harness event types.
 */
export type HarnessEvent =
  | RunStarted
  | WorkspaceCreated
  | TemplateFetched
  | TemplatePruned
  | DependenciesInjected
  | ExamplesLinked
  | ExampleCheckStarted
  | ExampleCheckFinished
  | RunFinished
  | WorkspaceRemoved;

export type HarnessEventType = HarnessEvent['type'];

export const EVENT_SCHEMA_VERSION = 1;

/**
 * Common metadata for a new event; spread it into the event literal.
 */
export function eventBase(runId: string): Omit<BaseEvent, 'type'> {
  return {
    schemaVersion: EVENT_SCHEMA_VERSION,
    timestamp: new Date().toISOString(),
    runId,
  };
}
