/**
 * @file Centralized configuration management for lint-miner.
 *       Manages the dataset location, git and analyzer settings, repository discovery and logging.
 */

import * as path from 'path';
import type { LogLevel } from '../utils/logger';

export interface DatasetConfig {
  rootDir: string;
}

export interface GitConfig {
  timeoutMs: number;
  fallbackBranch: string;
  workspacePrefix: string;
}

export interface AnalyzerConfig {
  command: string[];
  timeoutMs: number;
}

export interface DiscoveryConfig {
  token?: string;
  query: string;
  maxPages: number;
  perPage: number;
  maxRepositories: number;
}

export interface LoggingConfig {
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  logFilePath?: string;
}

export interface AppConfig {
  dataset: DatasetConfig;
  git: GitConfig;
  analyzer: AnalyzerConfig;
  discovery: DiscoveryConfig;
  logging: LoggingConfig;
}

export type ConfigOverrides = {
  [K in keyof AppConfig]?: Partial<AppConfig[K]>;
};

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/** Largest delay Node timers honour; longer ones fire after 1 ms. */
export const MAX_TIMEOUT_MS = 2147483647;

/**
 * Default configuration for lint-miner.
 */
function createDefaultConfig(): AppConfig {
  return {
    dataset: {
      rootDir: './dataset',
    },
    git: {
      timeoutMs: 300000,
      fallbackBranch: 'main',
      workspacePrefix: 'repo_',
    },
    analyzer: {
      command: ['ruff', 'check', '--output-format', 'json', '.'],
      timeoutMs: 60000,
    },
    discovery: {
      query: 'ruff language:Python',
      maxPages: 5,
      perPage: 50,
      maxRepositories: 10,
    },
    logging: {
      level: 'info',
      enableConsole: true,
      enableFile: false,
    },
  };
}

function parsePositiveInt(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return !isNaN(parsed) && parsed > 0 ? parsed : undefined;
}

function parseTimeout(value: string | undefined): number | undefined {
  const parsed = parsePositiveInt(value);
  return parsed !== undefined && parsed <= MAX_TIMEOUT_MS ? parsed : undefined;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Configuration manager class that handles loading and merging configurations
 * from defaults, environment variables and explicit (CLI) overrides.
 */
export class ConfigManager {
  private config: AppConfig;
  private projectRoot: string;

  constructor(projectRoot: string, env: NodeJS.ProcessEnv = process.env) {
    this.projectRoot = projectRoot;
    this.config = this.loadConfig(env);
  }

  /**
   * Priority: Environment variables > Defaults. CLI flags are applied afterwards through updateConfig.
   */
  private loadConfig(env: NodeJS.ProcessEnv): AppConfig {
    const config = createDefaultConfig();

    config.dataset.rootDir = path.resolve(this.projectRoot, env.LINT_MINER_DATASET_DIR || config.dataset.rootDir);

    const gitTimeout = parseTimeout(env.LINT_MINER_GIT_TIMEOUT);
    if (gitTimeout) {
      config.git.timeoutMs = gitTimeout;
    }

    if (env.LINT_MINER_ANALYZER_COMMAND) {
      const command = env.LINT_MINER_ANALYZER_COMMAND.split(/\s+/).filter(part => part !== '');
      if (command.length > 0) {
        config.analyzer.command = command;
      }
    }
    const analyzerTimeout = parseTimeout(env.LINT_MINER_ANALYZER_TIMEOUT);
    if (analyzerTimeout) {
      config.analyzer.timeoutMs = analyzerTimeout;
    }

    if (env.GITHUB_TOKEN) {
      config.discovery.token = env.GITHUB_TOKEN;
    }
    if (env.LINT_MINER_QUERY) {
      config.discovery.query = env.LINT_MINER_QUERY;
    }
    const maxPages = parsePositiveInt(env.LINT_MINER_MAX_PAGES);
    if (maxPages) {
      config.discovery.maxPages = maxPages;
    }
    const maxRepositories = parsePositiveInt(env.LINT_MINER_MAX_REPOSITORIES);
    if (maxRepositories) {
      config.discovery.maxRepositories = maxRepositories;
    }

    if (env.LINT_MINER_LOG_LEVEL && isLogLevel(env.LINT_MINER_LOG_LEVEL)) {
      config.logging.level = env.LINT_MINER_LOG_LEVEL;
    }
    if (env.LINT_MINER_LOG_FILE) {
      config.logging.enableFile = true;
      config.logging.logFilePath = path.resolve(this.projectRoot, env.LINT_MINER_LOG_FILE);
    }

    return config;
  }

  public getConfig(): AppConfig {
    return this.config;
  }

  public getDatasetConfig(): DatasetConfig {
    return this.config.dataset;
  }

  public getGitConfig(): GitConfig {
    return this.config.git;
  }

  public getAnalyzerConfig(): AnalyzerConfig {
    return this.config.analyzer;
  }

  public getDiscoveryConfig(): DiscoveryConfig {
    return this.config.discovery;
  }

  public getLoggingConfig(): LoggingConfig {
    return this.config.logging;
  }

  /**
   * Merges section-level overrides into the current configuration.
   * The dataset directory is resolved against the project root.
   */
  public updateConfig(updates: ConfigOverrides): void {
    this.config = {
      dataset: { ...this.config.dataset, ...updates.dataset },
      git: { ...this.config.git, ...updates.git },
      analyzer: { ...this.config.analyzer, ...updates.analyzer },
      discovery: { ...this.config.discovery, ...updates.discovery },
      logging: { ...this.config.logging, ...updates.logging },
    };
    if (updates.dataset?.rootDir) {
      this.config.dataset.rootDir = path.resolve(this.projectRoot, updates.dataset.rootDir);
    }
  }
}
