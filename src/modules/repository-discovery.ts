/**
 * @file Finds candidate repositories through the GitHub search API and validates the token
 *       used for it. Any non-success response is fatal to the run.
 */

import { Octokit } from '@octokit/rest';
import { DiscoveryConfig } from '../config';
import { getLogger } from '../utils/logger';
import { CredentialsError, DiscoveryError, getErrorMessage } from '../utils/error-handling';

/**
 * The slice of the GitHub REST client used for discovery.
 */
export interface RepositorySearchClient {
  users: {
    getAuthenticated(): Promise<{ status: number; data: { login: string } }>;
  };
  search: {
    repos(params: { q: string; per_page: number; page: number }): Promise<{
      status: number;
      data: { items: Array<{ clone_url: string }> };
    }>;
  };
}

function statusOf(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

export class RepositoryDiscovery {
  private client: RepositorySearchClient | null;
  private config: DiscoveryConfig;
  private logger = getLogger('RepositoryDiscovery');

  constructor(config: DiscoveryConfig, client?: RepositorySearchClient) {
    this.config = config;
    this.client = client ?? (config.token ? new Octokit({ auth: config.token }) : null);
  }

  private requireClient(): RepositorySearchClient {
    if (!this.client) {
      throw new CredentialsError('GITHUB_TOKEN is not set');
    }
    return this.client;
  }

  /**
   * Checks the token against the authenticated-user endpoint and returns the login.
   */
  async validateCredentials(): Promise<string> {
    const client = this.requireClient();
    try {
      const response = await client.users.getAuthenticated();
      if (response.status !== 200) {
        throw new CredentialsError(`Token rejected with status ${response.status}`, response.status);
      }
      this.logger.info(`Token valid, authenticated as ${response.data.login}`);
      return response.data.login;
    } catch (error) {
      if (error instanceof CredentialsError) {
        throw error;
      }
      const status = statusOf(error);
      throw new CredentialsError(
        `Invalid token or missing permissions${status ? ` (status ${status})` : ''}: ${getErrorMessage(error)}`,
        status
      );
    }
  }

  /**
   * Collects the clone URLs of every search result on pages 1..maxPages.
   */
  async searchRepositories(query: string = this.config.query, maxPages: number = this.config.maxPages): Promise<string[]> {
    const client = this.requireClient();
    const cloneUrls: string[] = [];
    this.logger.info('Searching repositories', { query, maxPages });

    for (let page = 1; page <= maxPages; page++) {
      let items: Array<{ clone_url: string }>;
      try {
        const response = await client.search.repos({ q: query, per_page: this.config.perPage, page });
        if (response.status !== 200) {
          throw new DiscoveryError(`unexpected status ${response.status}`, page, response.status);
        }
        items = response.data.items;
      } catch (error) {
        if (error instanceof DiscoveryError) {
          throw error;
        }
        throw new DiscoveryError(getErrorMessage(error), page, statusOf(error), error);
      }

      for (const item of items) {
        cloneUrls.push(item.clone_url);
      }
    }

    this.logger.info(`${cloneUrls.length} repositories found`);
    return cloneUrls;
  }
}
