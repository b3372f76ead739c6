import { ConfigStore } from './config-store';
import { TypedConfig } from './typed-config';
import { DEFAULT_CONFIG, type ConfigData, type DiffSettings, type UserSettings } from './types';

export { ConfigStore, TypedConfig, DEFAULT_CONFIG };
export type { ConfigData, DiffSettings, UserSettings };
