import {
  BlobObject,
  CommitObject,
  CommitPerson,
  EntryType,
  ObjectType,
  TreeEntry,
  TreeObject,
} from '../../core/objects';
import { ObjectException } from '../../core/exceptions';

const SHA_A = 'a'.repeat(40);
const SHA_B = 'b'.repeat(40);
const SHA_C = 'c'.repeat(40);

describe('BlobObject', () => {
  test('hashes the header and content', () => {
    const blob = new BlobObject(new TextEncoder().encode('hello\n'));
    expect(blob.sha()).toBe('ce013625030ba8dba906f756967f9e9ca394464a');
  });

  test('hashes empty content', () => {
    expect(new BlobObject().sha()).toBe('e69de29bb2d1d6434b8b29ae775ad8c2e48c5391');
  });

  test('reads back its serialized form', () => {
    const blob = new BlobObject(new TextEncoder().encode('some bytes'));
    const copy = new BlobObject();
    copy.deserialize(blob.serialize());
    expect(new TextDecoder().decode(copy.content())).toBe('some bytes');
  });

  test('rejects a header of another type', () => {
    const tree = new TreeObject();
    expect(() => new BlobObject().deserialize(tree.serialize())).toThrow(ObjectException);
  });

  test('rejects a size mismatch', () => {
    const data = new TextEncoder().encode('blob 10\0short');
    expect(() => new BlobObject().deserialize(data)).toThrow(
      'Content size mismatch expected: 10, got 5'
    );
  });
});

describe('TreeObject', () => {
  test('sorts directories as if their name ended in a slash', () => {
    const tree = new TreeObject([
      new TreeEntry(EntryType.DIRECTORY, 'dir', SHA_A),
      new TreeEntry(EntryType.REGULAR_FILE, 'dir.txt', SHA_B),
      new TreeEntry(EntryType.EXECUTABLE_FILE, 'a', SHA_C),
    ]);

    expect(tree.entries.map((e) => e.name)).toEqual(['a', 'dir.txt', 'dir']);
  });

  test('reads back entries with their modes', () => {
    const tree = new TreeObject([
      new TreeEntry(EntryType.SYMBOLIC_LINK, 'link', SHA_A),
      new TreeEntry(EntryType.REGULAR_FILE, 'file', SHA_B),
    ]);
    const copy = new TreeObject();
    copy.deserialize(tree.serialize());

    expect(copy.entries.map((e) => [e.mode, e.name, e.sha])).toEqual([
      [EntryType.REGULAR_FILE, 'file', SHA_B],
      [EntryType.SYMBOLIC_LINK, 'link', SHA_A],
    ]);
    expect(copy.sha()).toBe(tree.sha());
  });

  test('an empty tree has no entries', () => {
    expect(new TreeObject().isEmpty()).toBe(true);
    expect(new TreeObject().type()).toBe(ObjectType.TREE);
  });
});

describe('TreeEntry', () => {
  test.each<[EntryType, string]>([
    [EntryType.REGULAR_FILE, 'file'],
    [EntryType.EXECUTABLE_FILE, 'file'],
    [EntryType.SYMBOLIC_LINK, 'symlink'],
    [EntryType.DIRECTORY, 'directory'],
    [EntryType.SUBMODULE, 'submodule'],
  ])('mode %s is a %s', (mode, kind) => {
    expect(TreeEntry.kindOf(mode)).toBe(kind);
  });

  test('rejects unknown modes, slashes in names and bad ids', () => {
    expect(() => new TreeEntry('100000', 'x', SHA_A)).toThrow('Unknown mode: 100000');
    expect(() => new TreeEntry(EntryType.REGULAR_FILE, 'a/b', SHA_A)).toThrow(ObjectException);
    expect(() => new TreeEntry(EntryType.REGULAR_FILE, 'x', 'xyz')).toThrow('Invalid object id: xyz');
  });

  test('lowercases the object id', () => {
    expect(new TreeEntry(EntryType.REGULAR_FILE, 'x', 'A'.repeat(40)).sha).toBe(SHA_A);
  });
});

describe('CommitPerson', () => {
  test('formats and parses the identity line', () => {
    const person = new CommitPerson('Test User', 'test@example.com', 1700000000, '-0130');
    const line = person.formatForGit();

    expect(line).toBe('Test User <test@example.com> 1700000000 -0130');
    expect(CommitPerson.parseFromGit(line)).toEqual(person);
  });

  test('rejects a malformed timezone', () => {
    expect(() => new CommitPerson('Test User', 'test@example.com', 0, '0100')).toThrow(
      'Invalid timezone format: 0100'
    );
  });
});

describe('CommitObject', () => {
  const author = new CommitPerson('Test User', 'test@example.com', 1700000000, '+0000');

  test('serializes headers then the message', () => {
    const commit = new CommitObject({
      treeSha: SHA_A,
      parentShas: [SHA_B],
      author,
      committer: author,
      message: 'Initial commit\n\nBody text\n',
    });

    expect(new TextDecoder().decode(commit.content())).toBe(
      `tree ${SHA_A}\n` +
        `parent ${SHA_B}\n` +
        'author Test User <test@example.com> 1700000000 +0000\n' +
        'committer Test User <test@example.com> 1700000000 +0000\n' +
        '\n' +
        'Initial commit\n\nBody text\n'
    );
  });

  test('reads back a root commit', () => {
    const commit = new CommitObject({ treeSha: SHA_A, author, committer: author, message: 'Root\n' });
    const copy = new CommitObject();
    copy.deserialize(commit.serialize());

    expect(copy.treeSha).toBe(SHA_A);
    expect(copy.parentShas).toEqual([]);
    expect(copy.author).toEqual(author);
    expect(copy.summary).toBe('Root');
    expect(copy.sha()).toBe(commit.sha());
  });

  test('rejects a commit without a tree', () => {
    const data = new TextEncoder().encode(
      `author ${author.formatForGit()}\ncommitter ${author.formatForGit()}\n\nmsg`
    );
    const framed = new Uint8Array([...new TextEncoder().encode(`commit ${data.length}\0`), ...data]);

    expect(() => new CommitObject().deserialize(framed)).toThrow('Tree SHA is required');
  });

  test('an unset commit has no content', () => {
    expect(() => new CommitObject().content()).toThrow('Tree SHA is required for commit');
  });
});
