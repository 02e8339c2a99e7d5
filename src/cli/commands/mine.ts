import { Command } from 'commander';
import { BaseCommand, GlobalCLIOptions } from './base';
import { Miner, createPipelineDependencies } from '../../core/miner';
import { RepositoryDiscovery } from '../../modules/repository-discovery';
import { displayCommandHeader, displayProgress, displayRunSummary } from '../ui';

export class MineCommand extends BaseCommand {
  register(): Command {
    return this.program
      .command('mine [repo-urls...]')
      .description('Mine the linter violations of every commit; discovers repositories on GitHub when no URL is given')
      .option('--dataset <dir>', 'Dataset output directory')
      .option('-q, --query <query>', 'GitHub search query used for discovery')
      .option('--pages <n>', 'Number of search result pages to fetch')
      .option('--limit <n>', 'Maximum number of discovered repositories to mine')
      .option('--analyzer-timeout <ms>', 'Analyzer timeout per commit in milliseconds')
      .option('--log-level <level>', 'debug|info|warn|error')
      .action(async (repoUrls: string[], options: GlobalCLIOptions) => {
        try {
          const config = this.initConfigAndLogger(options);
          const datasetDir = config.getDatasetConfig().rootDir;

          let cloneUrls = repoUrls;
          if (cloneUrls.length === 0) {
            const discoveryConfig = config.getDiscoveryConfig();
            const discovery = new RepositoryDiscovery(discoveryConfig);
            displayProgress('Validating GitHub token...');
            await discovery.validateCredentials();
            displayProgress(`Searching repositories: ${discoveryConfig.query}`);
            const found = await discovery.searchRepositories();
            cloneUrls = found.slice(0, discoveryConfig.maxRepositories);
          }

          displayCommandHeader('Lint Miner', `Mining ${cloneUrls.length} repositories into ${datasetDir}`);

          const miner = new Miner(createPipelineDependencies(config));
          const summary = await miner.mineAll(cloneUrls);

          displayRunSummary(summary, datasetDir);
        } catch (error) {
          this.handleError(error, 'Mining failed');
        }
      });
  }
}
