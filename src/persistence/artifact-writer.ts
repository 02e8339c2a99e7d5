/**
 * @file Persists mined violations under the dataset directory:
 *
 *         dataset/<project_name>/<short_hash>/<local_file_name>          file snapshot
 *         dataset/<project_name>/<short_hash>/violation_<code>_<i>.json  violation record
 *
 *       Snapshots are first-writer-wins per commit directory; a failure on one violation
 *       never affects its siblings.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import {
  Commit,
  PersistResult,
  RepositoryContext,
  SkipReason,
  SkippedViolation,
  Violation,
  ViolationRecord,
} from '../types';
import { DatasetConfig } from '../config';
import { getLogger } from '../utils/logger';
import { getErrorMessage } from '../utils/error-handling';

/**
 * Formats a date as YYYY-MM-DD in local time.
 */
export function formatCommitDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export function recordFileName(code: string, index: number): string {
  return `violation_${code}_${index}.json`;
}

export function buildViolationRecord(
  context: RepositoryContext,
  commit: Commit,
  violation: Violation
): ViolationRecord {
  return {
    project_name: context.source.name,
    owner: context.source.owner,
    branch: context.branch,
    commit_hash: commit.shortHash,
    full_commit_hash: commit.fullHash,
    commit_date: formatCommitDate(commit.committedAt),
    file_path_in_repo: violation.filePath,
    local_file_name: path.basename(violation.filePath),
    line: violation.line,
    linter_code: violation.code,
    message: violation.message,
    repo_url: context.source.cloneUrl,
  };
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

export class ArtifactWriter {
  private config: DatasetConfig;
  private logger = getLogger('ArtifactWriter');

  constructor(config: DatasetConfig) {
    this.config = config;
  }

  commitDirectory(projectName: string, commit: Commit): string {
    return path.join(this.config.rootDir, projectName, commit.shortHash);
  }

  async persist(context: RepositoryContext, commit: Commit, violations: Violation[]): Promise<PersistResult> {
    const result: PersistResult = { written: 0, skipped: [] };
    if (violations.length === 0) {
      return result;
    }

    const commitDir = this.commitDirectory(context.source.name, commit);
    await fs.mkdir(commitDir, { recursive: true });

    const skip = (violation: Violation, index: number, reason: SkipReason): void => {
      const skipped: SkippedViolation = { violation, index, reason };
      result.skipped.push(skipped);
    };

    for (const [position, violation] of violations.entries()) {
      const index = position + 1;

      const sourcePath = this.resolveInWorkspace(context.workspace.path, violation.filePath);
      if (!sourcePath || !(await this.isFile(sourcePath))) {
        this.logger.warn('File not found in workspace', { file: violation.filePath, commit: commit.shortHash });
        skip(violation, index, 'missing-file');
        continue;
      }

      let content: string;
      try {
        // Malformed UTF-8 sequences are replaced rather than rejected
        content = (await fs.readFile(sourcePath)).toString('utf8');
      } catch (error) {
        this.logger.error('Failed to read file content', { file: violation.filePath, error: getErrorMessage(error) });
        skip(violation, index, 'unreadable-file');
        continue;
      }

      const record = buildViolationRecord(context, commit, violation);

      if (!(await this.writeSnapshot(commitDir, record.local_file_name, content))) {
        skip(violation, index, 'snapshot-write-failed');
        continue;
      }

      const recordPath = path.join(commitDir, recordFileName(record.linter_code, index));
      try {
        await fs.writeFile(recordPath, JSON.stringify(record, null, 4), 'utf8');
        result.written++;
      } catch (error) {
        this.logger.error('Failed to save violation record', { file: recordPath, error: getErrorMessage(error) });
        skip(violation, index, 'record-write-failed');
      }
    }

    this.logger.debug('Persisted commit violations', {
      commit: commit.shortHash,
      written: result.written,
      skipped: result.skipped.length,
    });
    return result;
  }

  /**
   * Resolves a workspace-relative path, or null when it points outside the workspace.
   */
  private resolveInWorkspace(workspaceRoot: string, filePath: string): string | null {
    const root = path.resolve(workspaceRoot);
    const resolved = path.resolve(root, filePath);
    const relative = path.relative(root, resolved);
    if (!relative || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
      return null;
    }
    return resolved;
  }

  private async isFile(filePath: string): Promise<boolean> {
    try {
      return (await fs.stat(filePath)).isFile();
    } catch {
      return false;
    }
  }

  /**
   * Writes the snapshot unless one with the same name already exists in the commit directory.
   * Returns false only when the write itself failed.
   */
  private async writeSnapshot(commitDir: string, fileName: string, content: string): Promise<boolean> {
    const destination = path.join(commitDir, fileName);
    try {
      await fs.writeFile(destination, content, { encoding: 'utf8', flag: 'wx' });
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        return true;
      }
      this.logger.error('Failed to save file snapshot', { file: destination, error: getErrorMessage(error) });
      return false;
    }
  }
}
