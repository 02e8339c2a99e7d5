import * as path from 'path';
import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigManager, ConfigOverrides, MAX_TIMEOUT_MS, isLogLevel } from '../../config';
import { initializeLogger } from '../../utils/logger';
import { getErrorMessage } from '../../utils/error-handling';

export interface GlobalCLIOptions {
  dataset?: string;
  query?: string;
  pages?: string;
  limit?: string;
  analyzerTimeout?: string;
  logLevel?: string;
}

function parsePositive(value: string | undefined, flag: string, max: number = Number.MAX_SAFE_INTEGER): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    throw new Error(`${flag} must be a positive integer, got "${value}"`);
  }
  if (parsed > max) {
    throw new Error(`${flag} must be at most ${max}, got "${value}"`);
  }
  return parsed;
}

export abstract class BaseCommand {
  protected readonly program: Command;

  constructor(program: Command) {
    this.program = program;
  }

  abstract register(): Command;

  /**
   * Builds the configuration once: defaults, then environment, then CLI flags.
   * The logger is initialized from the result.
   */
  protected initConfigAndLogger(opts: GlobalCLIOptions, projectRoot: string = process.cwd()): ConfigManager {
    const config = new ConfigManager(path.resolve(projectRoot));
    config.updateConfig(this.buildExplicitConfig(opts));

    const loggingConfig = config.getLoggingConfig();
    initializeLogger({
      level: loggingConfig.level,
      enableConsole: loggingConfig.enableConsole,
      enableFile: loggingConfig.enableFile,
      logFilePath: loggingConfig.logFilePath,
    });
    return config;
  }

  protected buildExplicitConfig(opts: GlobalCLIOptions): ConfigOverrides {
    const overrides: ConfigOverrides = {};

    if (opts.dataset) {
      overrides.dataset = { rootDir: opts.dataset };
    }

    const maxPages = parsePositive(opts.pages, '--pages');
    const maxRepositories = parsePositive(opts.limit, '--limit');
    overrides.discovery = {
      ...(opts.query ? { query: opts.query } : {}),
      ...(maxPages ? { maxPages } : {}),
      ...(maxRepositories ? { maxRepositories } : {}),
    };

    const analyzerTimeout = parsePositive(opts.analyzerTimeout, '--analyzer-timeout', MAX_TIMEOUT_MS);
    if (analyzerTimeout) {
      overrides.analyzer = { timeoutMs: analyzerTimeout };
    }

    if (opts.logLevel) {
      if (!isLogLevel(opts.logLevel)) {
        throw new Error(`Unknown log level: ${opts.logLevel}`);
      }
      overrides.logging = { level: opts.logLevel };
    }

    return overrides;
  }

  protected handleError(error: unknown, context: string): never {
    console.error(chalk.red(`❌ ${context}: ${getErrorMessage(error)}`));
    if (process.env.NODE_ENV === 'development' && error instanceof Error && error.stack) {
      console.error(chalk.gray(error.stack));
    }
    process.exit(1);
  }
}
