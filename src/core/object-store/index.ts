export type { ObjectStore } from './store';
export { FileObjectStore } from './file-object-store';
