import { RefManager } from './ref-manager';

export { RefManager };
