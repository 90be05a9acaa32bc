export type RawEventKind = 'create' | 'remove' | 'modify-metadata' | 'modify-data' | 'modify-name' | 'other';

/** A filesystem notification as the watcher saw it. Renames carry [from, to]. */
export interface RawFileEvent {
  kind: RawEventKind;
  paths: string[];
  timestamp: number;
}

export type CanonicalAction =
  | { type: 'Created'; path: string }
  | { type: 'Removed'; path: string }
  | { type: 'MetadataChanged'; path: string }
  | { type: 'ContentChanged'; path: string }
  | { type: 'Renamed'; from: string; to: string };

export type HandleStatus = 'applied' | 'skipped' | 'failed' | 'ignored';

export interface HandleOutcome {
  action: CanonicalAction | null;
  status: HandleStatus;
  /** Score written back after the mutation, when one was computed. */
  score?: number;
  reason?: string;
}
