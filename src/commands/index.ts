import { initCommand } from './init/init';
import { addCommand } from './add/add';
import { commitCommand } from './commit/commit';
import { diffCommand } from './diff/diff';
import { suggestCommand } from './suggest/suggest';

export { initCommand, addCommand, commitCommand, diffCommand, suggestCommand };
