/**
 * @file Public entry point of lint-miner.
 *       Re-exports the mining pipeline, its ports and the configuration layer.
 */

export * from './types';
export { ConfigManager } from './config';
export type { AppConfig, ConfigOverrides, AnalyzerConfig, DatasetConfig, DiscoveryConfig, GitConfig } from './config';
export { MiningPipeline } from './core/MiningPipeline';
export type { MiningPipelineDependencies } from './core/MiningPipeline';
export { Miner, createPipelineDependencies } from './core/miner';
export { SpawnCommandRunner } from './modules/command-runner';
export type { CommandRunner, CommandResult } from './modules/command-runner';
export { GitVersionControl, createCommit, parseCommitLog } from './modules/version-control';
export type { VersionControlPort } from './modules/version-control';
export { RuffViolationCollector } from './modules/violation-collector';
export type { ViolationCollector } from './modules/violation-collector';
export { RepositoryDiscovery } from './modules/repository-discovery';
export type { RepositorySearchClient } from './modules/repository-discovery';
export { parseRepositorySource } from './modules/repository-source';
export { ArtifactWriter, buildViolationRecord, formatCommitDate } from './persistence/artifact-writer';
export { initializeLogger, getLogger } from './utils/logger';
export {
  CheckoutError,
  CloneError,
  CredentialsError,
  DiscoveryError,
  InvalidRepositoryUrlError,
} from './utils/error-handling';
