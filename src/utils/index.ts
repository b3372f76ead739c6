import { FileUtils } from './io/file';
import { PathUtils } from './io/path';
import { HashUtils } from './helpers/hash';
import { CompressionUtils } from './helpers/compress';
import { logger } from './cli/logger';
import { display, displayError } from './cli/display';

export { FileUtils, HashUtils, CompressionUtils, logger, display, displayError, PathUtils };
export type { LogLevel } from './cli/logger';
