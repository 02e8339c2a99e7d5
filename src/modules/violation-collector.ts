/**
 * @file Runs the static analyzer against the current workspace state and turns its JSON
 *       report into violations. A silent analyzer, a timeout or unparseable output all mean
 *       "no violations for this commit"; none of them is an error for the caller.
 */

import * as path from 'path';
import { z } from 'zod';
import { CollectionResult, Violation, Workspace } from '../types';
import { AnalyzerConfig } from '../config';
import { CommandRunner } from './command-runner';
import { getLogger } from '../utils/logger';
import { getErrorMessage } from '../utils/error-handling';

/**
 * Code recorded for diagnostics the analyzer reports without a rule code (syntax errors).
 */
export const SYNTAX_ERROR_CODE = 'E999';

const AnalyzerEntrySchema = z.object({
  filename: z.string().min(1),
  location: z.object({
    row: z.number().int().positive(),
  }),
  code: z.string().min(1).nullable(),
  message: z.string(),
});

export interface ViolationCollector {
  collect(workspace: Workspace): Promise<CollectionResult>;
}

export class RuffViolationCollector implements ViolationCollector {
  private config: AnalyzerConfig;
  private runner: CommandRunner;
  private logger = getLogger('ViolationCollector');

  constructor(runner: CommandRunner, config: AnalyzerConfig) {
    this.runner = runner;
    this.config = config;
  }

  async collect(workspace: Workspace): Promise<CollectionResult> {
    const result = await this.runner.run(this.config.command, workspace.path, this.config.timeoutMs);

    switch (result.kind) {
      case 'timed-out':
        this.logger.warn('Analyzer timed out, no violations collected', { timeoutMs: result.timeoutMs });
        return { status: 'timed-out', violations: [] };
      case 'spawn-failed':
        this.logger.error('Analyzer could not be started', {
          command: this.config.command.join(' '),
          error: result.error,
        });
        return { status: 'command-failed', violations: [] };
      case 'completed':
        break;
    }

    if (!result.stdout.trim()) {
      return { status: 'no-output', violations: [] };
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(result.stdout);
    } catch (error) {
      this.logger.warn('Failed to decode analyzer output', {
        error: getErrorMessage(error),
        stderr: result.stderr,
      });
      return { status: 'unparseable', violations: [] };
    }

    if (!Array.isArray(parsed)) {
      this.logger.warn('Analyzer output is not a JSON array', { stderr: result.stderr });
      return { status: 'unparseable', violations: [] };
    }

    return { status: 'collected', violations: this.toViolations(parsed, workspace) };
  }

  private toViolations(entries: unknown[], workspace: Workspace): Violation[] {
    const violations: Violation[] = [];

    entries.forEach((entry, index) => {
      const parsed = AnalyzerEntrySchema.safeParse(entry);
      if (!parsed.success) {
        this.logger.warn('Dropping malformed analyzer entry', {
          index,
          issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
        });
        return;
      }

      const { filename, location, code, message } = parsed.data;
      violations.push({
        code: code ?? SYNTAX_ERROR_CODE,
        message,
        filePath: this.toWorkspaceRelative(filename, workspace),
        line: location.row,
      });
    });

    return violations;
  }

  // Ruff reports absolute filenames
  private toWorkspaceRelative(filename: string, workspace: Workspace): string {
    return path.isAbsolute(filename) ? path.relative(workspace.path, filename) : filename;
  }
}
