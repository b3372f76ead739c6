import { RevisionResolver } from './revision-resolver';
import type { Revision, RevisionRange, Signature } from './types';

export { RevisionResolver };
export type { Revision, RevisionRange, Signature };
