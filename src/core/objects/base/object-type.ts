import { ObjectException } from '@/core/exceptions';

/**
 * The word that opens every stored object's header.
 */
export enum ObjectType {
  BLOB = 'blob',
  TREE = 'tree',
  COMMIT = 'commit',
}

const OBJECT_TYPES: ReadonlySet<string> = new Set(Object.values(ObjectType));

const isObjectType = (value: string): value is ObjectType => OBJECT_TYPES.has(value);

export const parseObjectType = (header: string): ObjectType => {
  const word = header.split(' ', 1)[0] ?? '';
  if (!isObjectType(word)) {
    throw new ObjectException(`Unknown object type in header: ${JSON.stringify(header)}`);
  }
  return word;
};
