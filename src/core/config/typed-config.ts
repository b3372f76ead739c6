import path from 'path';
import type { Repository } from '@/core/repo';
import { ConfigStore } from './config-store';
import type { ConfigData, DiffSettings } from './types';

/**
 * Read-only view over a loaded configuration. It is created per command and
 * handed to whatever needs it; nothing caches it globally.
 */
export class TypedConfig {
  public static readonly CONFIG_FILE_NAME = 'config.json';

  private readonly data: ConfigData;
  private readonly env: NodeJS.ProcessEnv;

  constructor(data: ConfigData, env: NodeJS.ProcessEnv = process.env) {
    this.data = data;
    this.env = env;
  }

  /**
   * Load `<meta>/config.json`, or `overridePath` when given.
   */
  public static async load(repository: Repository, overridePath?: string): Promise<TypedConfig> {
    const configPath =
      overridePath ??
      path.join(repository.metaDirectory().fullpath(), TypedConfig.CONFIG_FILE_NAME);
    const store = new ConfigStore(configPath);
    return new TypedConfig(await store.load());
  }

  get diff(): Readonly<DiffSettings> {
    return this.data.diff;
  }

  get userName(): string | null {
    return this.data.user.name ?? this.fromEnv('HUNKWISE_AUTHOR_NAME');
  }

  get userEmail(): string | null {
    return this.data.user.email ?? this.fromEnv('HUNKWISE_AUTHOR_EMAIL');
  }

  get defaultBranch(): string {
    return this.data.defaultBranch;
  }

  private fromEnv(key: string): string | null {
    const value = this.env[key]?.trim();
    return value ? value : null;
  }
}
