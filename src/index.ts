export * from './core/exceptions';
export * from './core/diff';
export * from './core/suggestion';
export { RevisionResolver, type Revision, type RevisionRange, type Signature } from './core/revision';
export { LocalRepository, Repository, ObjectReader } from './core/repo';
export { IndexManager, StagingIndex, type AddResult, type IndexEntry } from './core/index';
export { CommitManager, type CommitOptions, type CommitResult } from './core/commit';
export { TypedConfig, ConfigStore, DEFAULT_CONFIG, type ConfigData } from './core/config';
export { WorkingDirectory, type Workspace } from './core/work-dir';
