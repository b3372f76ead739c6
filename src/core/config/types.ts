export interface DiffSettings {
  contextLines: number;
  renameThreshold: number;
  copyThreshold: number;
  rewriteThreshold: number;
  /**
   * Files larger than this many bytes on either side get no hunks. 0 disables the limit.
   */
  maxFileSize: number;
}

export interface UserSettings {
  name?: string;
  email?: string;
}

export interface ConfigData {
  diff: DiffSettings;
  user: UserSettings;
  defaultBranch: string;
}

export const DEFAULT_CONFIG: ConfigData = {
  diff: {
    contextLines: 3,
    renameThreshold: 50,
    copyThreshold: 100,
    rewriteThreshold: 50,
    maxFileSize: 0,
  },
  user: {},
  defaultBranch: 'main',
};
