export interface VersionTag {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly raw: string;
}

export interface ReleaseTrigger {
  readonly rawRef: string;
  readonly matched: boolean;
  readonly version?: VersionTag;
}

export type TargetKind = 'package' | 'executable';

export interface BuildTarget {
  readonly name: string;
  readonly kind: TargetKind;
  readonly platform?: string;
}

export type ErrorKind =
  | 'BuildFailure'
  | 'VerificationFailure'
  | 'PublishFailure'
  | 'DuplicateRelease';

export type ErrorCode =
  | 'missing_data_path'
  | 'unresolved_hidden_import'
  | 'version_mismatch'
  | 'missing_distribution'
  | 'tool_error'
  | 'timeout'
  | 'cancelled'
  | 'nonzero_exit'
  | 'malformed_archive'
  | 'metadata_unparseable'
  | 'credential_rejected'
  | 'network_error'
  | 'index_conflict'
  | 'release_conflict'
  | 'already_exists'
  | 'unexpected_error';

export interface ErrorInfo {
  kind: ErrorKind;
  code: ErrorCode;
  message: string;
  detail?: Record<string, string | number | boolean | null>;
}

export interface ArtifactHandle {
  files: string[];
}

export interface BuildArtifact {
  readonly target: BuildTarget;
  readonly handle: ArtifactHandle;
  readonly produced: boolean;
  readonly verified: boolean;
  readonly error?: ErrorInfo;
}

export interface SourceTree {
  root: string;
}

export type TargetPhase = 'build' | 'verify' | 'publish';

export interface TargetReport {
  target: string;
  kind: TargetKind;
  platform?: string;
  produced: boolean;
  verified: boolean;
  published: boolean;
  failedAt?: TargetPhase;
  files: string[];
  ack?: PublishAck;
  durationMs: number;
}

export interface PublishAck {
  channel: 'index' | 'release-assets';
  location: string;
  items: string[];
}

export type ReleaseStatus = 'rejected' | 'success' | 'partial' | 'failed' | 'aborted';

export interface ReleaseOutcome {
  runId: string;
  ref: string;
  status: ReleaseStatus;
  version?: VersionTag;
  published: string[];
  failed: Record<string, ErrorInfo>;
  targets: TargetReport[];
  stateHistory: Array<{ from: string; to: string; timestamp: string }>;
  invariantViolations?: string[];
  startedAt: string;
  finishedAt: string;
}
