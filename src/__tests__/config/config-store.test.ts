import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { ConfigStore, DEFAULT_CONFIG, TypedConfig } from '../../core/config';
import { logger } from '../../utils';
import { createTestRepo, type TestRepo } from '../helpers/repo-fixture';

describe('ConfigStore', () => {
  let dir: string;
  let configPath: string;
  let warn: jest.SpyInstance;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'hunkwise-config-'));
    configPath = path.join(dir, 'config.json');
    warn = jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    warn.mockRestore();
    await fs.remove(dir);
  });

  test('returns defaults when the file does not exist', async () => {
    const data = await new ConfigStore(configPath).load();
    expect(data).toEqual(DEFAULT_CONFIG);
    expect(warn).not.toHaveBeenCalled();
  });

  test('merges partial settings over the defaults', async () => {
    await fs.writeJson(configPath, {
      diff: { contextLines: 5, renameThreshold: 70 },
      user: { name: '  Ada  ' },
      defaultBranch: 'trunk',
    });

    const data = await new ConfigStore(configPath).load();

    expect(data).toEqual({
      diff: { ...DEFAULT_CONFIG.diff, contextLines: 5, renameThreshold: 70 },
      user: { name: 'Ada' },
      defaultBranch: 'trunk',
    });
  });

  test('falls back to the default for invalid diff values and warns', async () => {
    await fs.writeJson(configPath, { diff: { contextLines: -1, copyThreshold: 'high' } });

    const data = await new ConfigStore(configPath).load();

    expect(data.diff.contextLines).toBe(3);
    expect(data.diff.copyThreshold).toBe(100);
    expect(warn).toHaveBeenCalledTimes(2);
  });

  test('ignores blank user values and unknown keys', async () => {
    await fs.writeJson(configPath, { user: { name: ' ', email: 7 }, colour: 'auto' });
    const data = await new ConfigStore(configPath).load();
    expect(data.user).toEqual({});
  });

  test('uses defaults for unparseable JSON', async () => {
    await fs.writeFile(configPath, '{ not json');
    const data = await new ConfigStore(configPath).load();
    expect(data).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test('uses defaults when the top level is not an object', async () => {
    await fs.writeJson(configPath, [1, 2]);
    const data = await new ConfigStore(configPath).load();
    expect(data).toEqual(DEFAULT_CONFIG);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test('saves and reloads', async () => {
    const nested = path.join(dir, 'nested', 'config.json');
    const store = new ConfigStore(nested);
    await store.save({
      diff: { ...DEFAULT_CONFIG.diff, maxFileSize: 1024 },
      user: { email: 'test@example.com' },
      defaultBranch: 'main',
    });

    const reloaded = await new ConfigStore(nested).load();
    expect(reloaded.diff.maxFileSize).toBe(1024);
    expect(reloaded.user).toEqual({ email: 'test@example.com' });
  });

  test('loading does not mutate the shared defaults', async () => {
    await fs.writeJson(configPath, { diff: { contextLines: 9 } });
    await new ConfigStore(configPath).load();
    expect(DEFAULT_CONFIG.diff.contextLines).toBe(3);
  });
});

describe('TypedConfig', () => {
  test('prefers configured user values over the environment', () => {
    const config = new TypedConfig(
      { diff: { ...DEFAULT_CONFIG.diff }, user: { name: 'Configured' }, defaultBranch: 'main' },
      { HUNKWISE_AUTHOR_NAME: 'From Env', HUNKWISE_AUTHOR_EMAIL: 'env@example.com' }
    );

    expect(config.userName).toBe('Configured');
    expect(config.userEmail).toBe('env@example.com');
  });

  test('returns null when neither config nor environment has a value', () => {
    const config = new TypedConfig(
      { diff: { ...DEFAULT_CONFIG.diff }, user: {}, defaultBranch: 'main' },
      { HUNKWISE_AUTHOR_NAME: '   ' }
    );

    expect(config.userName).toBeNull();
    expect(config.userEmail).toBeNull();
  });

  describe('load', () => {
    let repo: TestRepo;

    beforeEach(async () => {
      repo = await createTestRepo();
    });

    afterEach(async () => {
      await repo.cleanup();
    });

    test('reads config.json from the repository directory', async () => {
      await fs.writeJson(path.join(repo.root, '.hunkwise', 'config.json'), {
        diff: { contextLines: 1 },
        defaultBranch: 'develop',
      });

      const config = await TypedConfig.load(repo.repository);

      expect(config.diff.contextLines).toBe(1);
      expect(config.defaultBranch).toBe('develop');
    });

    test('reads an override path instead', async () => {
      const override = path.join(repo.root, 'other.json');
      await fs.writeJson(override, { diff: { renameThreshold: 80 } });

      const config = await TypedConfig.load(repo.repository, override);

      expect(config.diff.renameThreshold).toBe(80);
    });
  });
});
