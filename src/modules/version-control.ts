/**
 * @file Materializes repositories into ephemeral workspaces and walks their history.
 *       Clones the full history into a temp directory, resolves the checked-out branch,
 *       enumerates commits most-recent-first and force-checks out each one in place.
 */

import { simpleGit, SimpleGit } from 'simple-git';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { Commit, Workspace } from '../types';
import { GitConfig } from '../config';
import { getLogger } from '../utils/logger';
import { CheckoutError, CloneError, Result, err, getErrorMessage, ok } from '../utils/error-handling';

export const SHORT_HASH_LENGTH = 7;

const LOG_LINE_PATTERN = /^([0-9a-f]{40}) (\d+)$/;

export interface VersionControlPort {
  materialize(cloneUrl: string): Promise<Result<Workspace, CloneError>>;
  activeBranch(workspace: Workspace): Promise<string>;
  listCommits(workspace: Workspace, branch: string): Promise<Commit[]>;
  checkout(workspace: Workspace, commitHash: string): Promise<Result<void, CheckoutError>>;
  release(workspace: Workspace): Promise<void>;
}

/**
 * Builds a commit from its full hash; the short hash is always a prefix of the full one.
 */
export function createCommit(fullHash: string, committedAt: Date, branch: string): Commit {
  return {
    fullHash,
    shortHash: fullHash.slice(0, SHORT_HASH_LENGTH),
    committedAt,
    branch,
  };
}

/**
 * Parses `git log --format="%H %ct"` output.
 */
export function parseCommitLog(output: string, branch: string): Commit[] {
  const commits: Commit[] = [];
  for (const line of output.split('\n')) {
    const match = LOG_LINE_PATTERN.exec(line.trim());
    if (!match) {
      continue;
    }
    commits.push(createCommit(match[1], new Date(Number(match[2]) * 1000), branch));
  }
  return commits;
}

export class GitVersionControl implements VersionControlPort {
  private config: GitConfig;
  private logger = getLogger('GitVersionControl');

  constructor(config: GitConfig) {
    this.config = config;
  }

  private gitFor(baseDir?: string): SimpleGit {
    return simpleGit({
      ...(baseDir ? { baseDir } : {}),
      timeout: { block: this.config.timeoutMs },
    });
  }

  async materialize(cloneUrl: string): Promise<Result<Workspace, CloneError>> {
    let workspace: Workspace;
    try {
      // Resolved so paths reported by child processes (their cwd) stay under the workspace
      workspace = { path: await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), this.config.workspacePrefix))) };
    } catch (error) {
      return err(new CloneError(cloneUrl, `cannot create workspace: ${getErrorMessage(error)}`, undefined, error));
    }

    const operation = this.logger.operation(`Cloning ${cloneUrl}`);
    try {
      await this.gitFor().clone(cloneUrl, workspace.path);
      operation({ cloned: true });
      return ok(workspace);
    } catch (error) {
      operation({ cloned: false });
      return err(new CloneError(cloneUrl, getErrorMessage(error), workspace, error));
    }
  }

  async activeBranch(workspace: Workspace): Promise<string> {
    try {
      const branch = (await this.gitFor(workspace.path).revparse(['--abbrev-ref', 'HEAD'])).trim();
      // Detached HEAD reports the literal "HEAD"
      if (branch && branch !== 'HEAD') {
        return branch;
      }
      this.logger.warn('No active branch, using fallback', { fallback: this.config.fallbackBranch });
    } catch (error) {
      this.logger.warn('Failed to resolve active branch, using fallback', {
        error: getErrorMessage(error),
        fallback: this.config.fallbackBranch,
      });
    }
    return this.config.fallbackBranch;
  }

  async listCommits(workspace: Workspace, branch: string): Promise<Commit[]> {
    try {
      const output = await this.gitFor(workspace.path).raw(['log', '--format=%H %ct', branch, '--']);
      const commits = parseCommitLog(output, branch);
      this.logger.info(`Found ${commits.length} commits on branch ${branch}`);
      return commits;
    } catch (error) {
      this.logger.error('Failed to list commits', { branch, error: getErrorMessage(error) });
      return [];
    }
  }

  async checkout(workspace: Workspace, commitHash: string): Promise<Result<void, CheckoutError>> {
    try {
      await this.gitFor(workspace.path).checkout(['--force', commitHash]);
      return ok(undefined);
    } catch (error) {
      return err(new CheckoutError(commitHash, getErrorMessage(error), error));
    }
  }

  async release(workspace: Workspace): Promise<void> {
    try {
      await fs.rm(workspace.path, { recursive: true, force: true });
      this.logger.debug('Released workspace', { path: workspace.path });
    } catch (error) {
      this.logger.warn('Failed to remove workspace', { path: workspace.path, error: getErrorMessage(error) });
    }
  }
}
