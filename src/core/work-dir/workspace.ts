/**
 * The working tree as the suggestion engine sees it. Paths are relative to
 * the repository root.
 */
export interface Workspace {
  resolvePath(relativePath: string): string;

  /**
   * Current bytes of a file, null when it does not exist. Other failures reject.
   */
  readFile(relativePath: string): Promise<Buffer | null>;

  writeFile(relativePath: string, content: Uint8Array): Promise<void>;

  /**
   * Record the current on-disk content of every path in the staging area,
   * all or none.
   */
  stagePaths(relativePaths: string[]): Promise<void>;
}
