import { Command } from 'commander';
import { BaseCommand, GlobalCLIOptions } from './base';
import { RepositoryDiscovery } from '../../modules/repository-discovery';
import { displayCommandHeader, displayRepositoryList } from '../ui';

export class SearchCommand extends BaseCommand {
  register(): Command {
    return this.program
      .command('search')
      .description('List the clone URLs of repositories matching the GitHub search query')
      .option('-q, --query <query>', 'GitHub search query')
      .option('--pages <n>', 'Number of search result pages to fetch')
      .option('--log-level <level>', 'debug|info|warn|error')
      .action(async (options: GlobalCLIOptions) => {
        try {
          const config = this.initConfigAndLogger(options);
          const discoveryConfig = config.getDiscoveryConfig();

          displayCommandHeader('Lint Miner Search', `Query: ${discoveryConfig.query}`);

          const discovery = new RepositoryDiscovery(discoveryConfig);
          await discovery.validateCredentials();
          const cloneUrls = await discovery.searchRepositories();

          displayRepositoryList(cloneUrls);
        } catch (error) {
          this.handleError(error, 'Search failed');
        }
      });
  }
}
