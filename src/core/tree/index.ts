import { TreeWalker, type FlatEntry } from './tree-walker';
import { TreeBuilder } from './tree-builder';

export { TreeWalker, TreeBuilder };
export type { FlatEntry };
