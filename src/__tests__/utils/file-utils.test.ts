import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { FileUtils } from '../../utils';

describe('FileUtils', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'hunkwise-files-'));
  });

  afterEach(async () => {
    await fs.remove(dir);
  });

  describe('isNotFound', () => {
    test('recognizes ENOENT from any realm by its code', () => {
      expect(FileUtils.isNotFound({ code: 'ENOENT', message: 'no such file' })).toBe(true);
      expect(FileUtils.isNotFound(Object.assign(new Error('missing'), { code: 'ENOENT' }))).toBe(
        true
      );
    });

    test('rejects other codes and non-objects', () => {
      expect(FileUtils.isNotFound({ code: 'EACCES' })).toBe(false);
      expect(FileUtils.isNotFound('ENOENT')).toBe(false);
      expect(FileUtils.isNotFound(null)).toBe(false);
    });

    test('recognizes the error fs raises for a missing file', async () => {
      let caught: unknown = null;
      try {
        await fs.readFile(path.join(dir, 'missing.txt'));
      } catch (error) {
        caught = error;
      }
      expect(FileUtils.isNotFound(caught)).toBe(true);
    });
  });

  describe('readFileIfExists', () => {
    test('returns null for a missing file', async () => {
      expect(await FileUtils.readFileIfExists(path.join(dir, 'missing.txt'))).toBeNull();
    });

    test('returns the bytes of an existing file', async () => {
      await fs.writeFile(path.join(dir, 'present.txt'), 'here\n');
      const content = await FileUtils.readFileIfExists(path.join(dir, 'present.txt'));
      expect(content?.toString('utf8')).toBe('here\n');
    });

    test('rethrows failures other than a missing file', async () => {
      await fs.ensureDir(path.join(dir, 'a-directory'));
      await expect(FileUtils.readFileIfExists(path.join(dir, 'a-directory'))).rejects.toMatchObject({
        code: 'EISDIR',
      });
    });
  });
});
