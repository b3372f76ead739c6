export { DiffEngine, diff, diffForRange, diffWorkspace } from './diff-engine';
export { DiffBuilder } from './diff-builder';
export { TreeComparison } from './tree-comparison';
export { HunkBuilder } from './hunk-builder';
export { MyersDiff, type MyersEdit } from './myers-diff';
export { LineSanitizer } from './line-sanitizer';
export { SectionExtractor } from './section-extractor';
export { StatusClassifier } from './status-classifier';
export { BinaryDetector } from './binary-detector';
export { ContentSignature, Similarity } from './similarity';
export * from './types';
