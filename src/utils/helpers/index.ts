import { getRepo } from './repo';
import { globalConfigPath } from './options';

export { getRepo, globalConfigPath };
