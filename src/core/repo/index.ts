import { LocalRepository } from './local-repo';
import { Repository } from './repo';
import { ObjectReader } from './object-reader';

export { LocalRepository, Repository, ObjectReader };
