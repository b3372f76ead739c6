import path from 'path';
import { SuggestionException } from '@/core/exceptions';

/**
 * Suggestion paths must be relative and free of ".." segments. Checked
 * before anything touches the filesystem. Returns the path in the form the
 * staging area stores, so `./a.txt` and `a\b.txt` name the same file as
 * `a.txt` and `a/b.txt`.
 */
export const ensureRelativePath = (relativePath: string): string => {
  if (path.posix.isAbsolute(relativePath) || path.win32.isAbsolute(relativePath)) {
    throw SuggestionException.absolutePath(relativePath);
  }
  if (relativePath.split(/[\\/]/).some((segment) => segment === '..')) {
    throw SuggestionException.pathTraversal(relativePath);
  }
  return path.posix.normalize(relativePath.replace(/\\/g, '/'));
};
