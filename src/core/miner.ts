import { ConfigManager } from '../config';
import { RunSummary } from '../types';
import { MiningPipeline, MiningPipelineDependencies } from './MiningPipeline';
import { GitVersionControl } from '../modules/version-control';
import { RuffViolationCollector } from '../modules/violation-collector';
import { SpawnCommandRunner } from '../modules/command-runner';
import { ArtifactWriter } from '../persistence/artifact-writer';
import { Logger, getLogger } from '../utils/logger';

/**
 * Wires the production implementations from configuration.
 */
export function createPipelineDependencies(config: ConfigManager): MiningPipelineDependencies {
  return {
    versionControl: new GitVersionControl(config.getGitConfig()),
    collector: new RuffViolationCollector(new SpawnCommandRunner(), config.getAnalyzerConfig()),
    writer: new ArtifactWriter(config.getDatasetConfig()),
  };
}

/**
 * Mines repositories strictly one after another. A failed repository never stops the run.
 */
export class Miner {
  private pipeline: MiningPipeline;
  private logger: Logger;

  constructor(dependencies: MiningPipelineDependencies) {
    this.pipeline = new MiningPipeline(dependencies);
    this.logger = getLogger('Miner');
  }

  async mineAll(cloneUrls: string[]): Promise<RunSummary> {
    const operation = this.logger.operation(`Mining ${cloneUrls.length} repositories`);
    const summary: RunSummary = {
      repositories: [],
      totalViolationsWritten: 0,
      failedRepositories: 0,
      duration: 0,
    };

    for (const cloneUrl of cloneUrls) {
      const report = await this.pipeline.mine(cloneUrl);
      summary.repositories.push(report);
      summary.totalViolationsWritten += report.violationsWritten;
      if (report.status !== 'completed') {
        summary.failedRepositories++;
      }
    }

    summary.duration = operation({
      failed: summary.failedRepositories,
      violationsWritten: summary.totalViolationsWritten,
    });
    return summary;
  }
}
