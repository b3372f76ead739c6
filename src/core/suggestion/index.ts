export { SuggestionApplier, dryRun, apply } from './suggestion-applier';
export { EditPlanner } from './edit-planner';
export { PatchRenderer } from './patch-renderer';
export { ApplyCommitter } from './apply-committer';
export { OffsetIndex } from './offset-index';
export { ensureRelativePath } from './path-guard';
export { SuggestionParser } from './suggestion-parser';
export * from './types';
