import path from 'path';
import fs from 'fs-extra';
import { FileUtils, logger } from '@/utils';
import { DEFAULT_CONFIG, type ConfigData, type DiffSettings, type UserSettings } from './types';

type JsonObject = { [key: string]: unknown };

const DIFF_KEYS: readonly (keyof DiffSettings)[] = [
  'contextLines',
  'renameThreshold',
  'copyThreshold',
  'rewriteThreshold',
  'maxFileSize',
];
const USER_KEYS: readonly (keyof UserSettings)[] = ['name', 'email'];

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Reads and writes one JSON configuration file. Unknown keys are ignored and
 * values of the wrong type fall back to their defaults with a warning.
 */
export class ConfigStore {
  private readonly configPath: string;
  private data: ConfigData = ConfigStore.defaults();

  constructor(configPath: string) {
    this.configPath = configPath;
  }

  public get filePath(): string {
    return this.configPath;
  }

  public get values(): ConfigData {
    return this.data;
  }

  public async load(): Promise<ConfigData> {
    if (!(await FileUtils.exists(this.configPath))) {
      this.data = ConfigStore.defaults();
      return this.data;
    }

    let raw: unknown;
    try {
      raw = await fs.readJson(this.configPath);
    } catch (error) {
      logger.warn(`Could not read config file ${this.configPath}, using defaults:`, error);
      this.data = ConfigStore.defaults();
      return this.data;
    }

    this.data = this.merge(raw);
    return this.data;
  }

  public async save(data: ConfigData = this.data): Promise<void> {
    this.data = data;
    await FileUtils.createDirectories(path.dirname(this.configPath));
    await fs.writeJson(this.configPath, data, { spaces: 2 });
  }

  private merge(raw: unknown): ConfigData {
    const merged = ConfigStore.defaults();
    if (!isObject(raw)) {
      logger.warn(`Config file ${this.configPath} is not a JSON object, using defaults`);
      return merged;
    }

    if (isObject(raw['diff'])) {
      const diff = raw['diff'];
      for (const key of DIFF_KEYS) {
        const value = diff[key];
        if (value === undefined) continue;
        if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
          merged.diff[key] = value;
        } else {
          logger.warn(`Ignoring invalid diff.${key} in ${this.configPath}: ${String(value)}`);
        }
      }
    }

    if (isObject(raw['user'])) {
      const user = raw['user'];
      for (const key of USER_KEYS) {
        const value = user[key];
        if (typeof value === 'string' && value.trim().length > 0) {
          merged.user[key] = value.trim();
        }
      }
    }

    const branch = raw['defaultBranch'];
    if (typeof branch === 'string' && branch.trim().length > 0) {
      merged.defaultBranch = branch.trim();
    }

    return merged;
  }

  private static defaults(): ConfigData {
    return {
      diff: { ...DEFAULT_CONFIG.diff },
      user: { ...DEFAULT_CONFIG.user },
      defaultBranch: DEFAULT_CONFIG.defaultBranch,
    };
  }
}
