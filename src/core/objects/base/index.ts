export { GitObject } from './git-object';
export { ObjectType, parseObjectType } from './object-type';
