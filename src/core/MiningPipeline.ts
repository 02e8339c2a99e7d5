/**
 * @file Mines one repository: materializes it, walks every commit of the active branch,
 *       collects analyzer violations at each commit and persists them.
 *
 *       INIT -> MATERIALIZED -> (CHECKED_OUT -> COLLECTED -> PERSISTED)* -> RELEASED
 *       INIT -> FAILED_RELEASED on clone failure
 *
 *       The workspace is released on every exit path. Nothing is thrown to the caller;
 *       failures are logged and reported in the RepositoryReport.
 */

import {
  CollectionStatus,
  Commit,
  PipelineState,
  RepositoryContext,
  RepositoryReport,
  RepositorySource,
  Workspace,
} from '../types';
import { VersionControlPort } from '../modules/version-control';
import { ViolationCollector } from '../modules/violation-collector';
import { ArtifactWriter } from '../persistence/artifact-writer';
import { parseRepositorySource } from '../modules/repository-source';
import { Logger, getLogger } from '../utils/logger';
import { getErrorMessage, logError } from '../utils/error-handling';

export interface MiningPipelineDependencies {
  versionControl: VersionControlPort;
  collector: ViolationCollector;
  writer: ArtifactWriter;
}

function emptyCollectionCounts(): Record<CollectionStatus, number> {
  return {
    collected: 0,
    'no-output': 0,
    'timed-out': 0,
    'command-failed': 0,
    unparseable: 0,
  };
}

export class MiningPipeline {
  private versionControl: VersionControlPort;
  private collector: ViolationCollector;
  private writer: ArtifactWriter;
  private logger: Logger;
  private state: PipelineState = 'INIT';

  constructor(dependencies: MiningPipelineDependencies) {
    this.versionControl = dependencies.versionControl;
    this.collector = dependencies.collector;
    this.writer = dependencies.writer;
    this.logger = getLogger('MiningPipeline');
  }

  getState(): PipelineState {
    return this.state;
  }

  private transition(next: PipelineState): void {
    this.logger.debug('State transition', { from: this.state, to: next });
    this.state = next;
  }

  async mine(cloneUrl: string): Promise<RepositoryReport> {
    const startTime = Date.now();
    this.state = 'INIT';
    const report: RepositoryReport = {
      repoUrl: cloneUrl,
      status: 'completed',
      finalState: 'INIT',
      commitsTotal: 0,
      commitsAnalyzed: 0,
      checkoutFailures: 0,
      commitsWithViolations: 0,
      collection: emptyCollectionCounts(),
      violationsWritten: 0,
      violationsSkipped: 0,
      duration: 0,
    };
    const finish = (): RepositoryReport => {
      report.finalState = this.state;
      report.duration = Date.now() - startTime;
      return report;
    };

    const parsed = parseRepositorySource(cloneUrl);
    if (!parsed.ok) {
      this.logger.error('Invalid repository URL', { url: cloneUrl, error: parsed.error.message });
      report.status = 'invalid-url';
      report.error = parsed.error.message;
      this.transition('FAILED_RELEASED');
      return finish();
    }
    const source = parsed.value;
    const log = this.logger.withFields({ repository: `${source.owner}/${source.name}` });

    log.info(`Cloning repository: ${source.cloneUrl}`);
    const materialized = await this.versionControl.materialize(source.cloneUrl);
    if (!materialized.ok) {
      log.error('Clone failed, skipping repository', { error: materialized.error.message });
      if (materialized.error.workspace) {
        await this.versionControl.release(materialized.error.workspace);
      }
      report.status = 'clone-failed';
      report.error = materialized.error.message;
      this.transition('FAILED_RELEASED');
      return finish();
    }

    const workspace = materialized.value;
    this.transition('MATERIALIZED');

    try {
      await this.mineCommits(source, workspace, report, log);
    } catch (error) {
      logError(log, 'Mining aborted unexpectedly', error);
      report.status = 'failed';
      report.error = getErrorMessage(error);
    } finally {
      await this.versionControl.release(workspace);
      this.transition('RELEASED');
    }

    log.info('Repository processed', {
      status: report.status,
      commits: report.commitsTotal,
      violationsWritten: report.violationsWritten,
    });
    return finish();
  }

  private async mineCommits(
    source: RepositorySource,
    workspace: Workspace,
    report: RepositoryReport,
    log: Logger
  ): Promise<void> {
    const branch = await this.versionControl.activeBranch(workspace);
    const commits = await this.versionControl.listCommits(workspace, branch);
    report.branch = branch;
    report.commitsTotal = commits.length;
    log.info(`${commits.length} commits found on branch ${branch}`);

    const context: RepositoryContext = { source, workspace, branch };

    for (const commit of commits) {
      await this.mineCommit(context, commit, report, log.withFields({ commit: commit.shortHash }));
      this.transition('MATERIALIZED');
    }
  }

  private async mineCommit(
    context: RepositoryContext,
    commit: Commit,
    report: RepositoryReport,
    log: Logger
  ): Promise<void> {
    const checkout = await this.versionControl.checkout(context.workspace, commit.fullHash);
    if (!checkout.ok) {
      log.warn('Checkout failed, skipping commit', { error: checkout.error.message });
      report.checkoutFailures++;
      return;
    }
    this.transition('CHECKED_OUT');

    log.info(`Analyzing commit ${commit.shortHash}`, { date: commit.committedAt.toISOString() });
    const collection = await this.collector.collect(context.workspace);
    report.commitsAnalyzed++;
    report.collection[collection.status]++;
    this.transition('COLLECTED');

    if (collection.violations.length === 0) {
      return;
    }

    try {
      const persisted = await this.writer.persist(context, commit, collection.violations);
      report.violationsWritten += persisted.written;
      report.violationsSkipped += persisted.skipped.length;
      if (persisted.written > 0) {
        report.commitsWithViolations++;
      }
      this.transition('PERSISTED');
    } catch (error) {
      logError(log, 'Failed to persist commit violations', error);
      report.violationsSkipped += collection.violations.length;
    }
  }
}
