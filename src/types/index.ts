/**
 * @file Defines the core data structures of the mining pipeline: the repository being mined,
 *       its ephemeral workspace, the commits walked, the violations reported by the analyzer
 *       and the records persisted to the dataset.
 */

/**
 * The repository being mined, derived once from the input URL.
 */
export interface RepositorySource {
  readonly cloneUrl: string;
  readonly owner: string;
  readonly name: string;
}

/**
 * Ephemeral on-disk materialization of one repository. Owned by exactly one pipeline run.
 */
export interface Workspace {
  readonly path: string;
}

/**
 * A commit on the mined branch.
 * @property {string} fullHash - 40 hex characters.
 * @property {string} shortHash - The first 7 characters of fullHash, used as the dataset directory key.
 * @property {Date} committedAt - Committer timestamp.
 */
export interface Commit {
  readonly fullHash: string;
  readonly shortHash: string;
  readonly committedAt: Date;
  readonly branch: string;
}

/**
 * One finding reported by the analyzer for a file and line at the current workspace state.
 * @property {string} filePath - Relative to the workspace root.
 * @property {number} line - 1-based row.
 */
export interface Violation {
  code: string;
  message: string;
  filePath: string;
  line: number;
}

/**
 * Persisted unit combining a violation with repository and commit metadata.
 * Keys follow the dataset's JSON layout.
 */
export interface ViolationRecord {
  project_name: string;
  owner: string;
  branch: string;
  commit_hash: string;
  full_commit_hash: string;
  commit_date: string;
  file_path_in_repo: string;
  local_file_name: string;
  line: number;
  linter_code: string;
  message: string;
  repo_url: string;
}

/**
 * What the artifact writer needs to know about the repository and its workspace.
 */
export interface RepositoryContext {
  source: RepositorySource;
  workspace: Workspace;
  branch: string;
}

export type CollectionStatus =
  | 'collected'
  | 'no-output'
  | 'timed-out'
  | 'command-failed'
  | 'unparseable';

export interface CollectionResult {
  status: CollectionStatus;
  violations: Violation[];
}

export type SkipReason =
  | 'missing-file'
  | 'unreadable-file'
  | 'snapshot-write-failed'
  | 'record-write-failed';

export interface SkippedViolation {
  violation: Violation;
  index: number;
  reason: SkipReason;
}

export interface PersistResult {
  written: number;
  skipped: SkippedViolation[];
}

/**
 * Lifecycle of one repository inside the mining pipeline.
 */
export type PipelineState =
  | 'INIT'
  | 'MATERIALIZED'
  | 'CHECKED_OUT'
  | 'COLLECTED'
  | 'PERSISTED'
  | 'RELEASED'
  | 'FAILED_RELEASED';

export type RepositoryStatus = 'completed' | 'invalid-url' | 'clone-failed' | 'failed';

export interface RepositoryReport {
  repoUrl: string;
  status: RepositoryStatus;
  finalState: PipelineState;
  branch?: string;
  commitsTotal: number;
  commitsAnalyzed: number;
  checkoutFailures: number;
  commitsWithViolations: number;
  collection: Record<CollectionStatus, number>;
  violationsWritten: number;
  violationsSkipped: number;
  duration: number;
  error?: string;
}

export interface RunSummary {
  repositories: RepositoryReport[];
  totalViolationsWritten: number;
  failedRepositories: number;
  duration: number;
}
