export {
  HunkwiseException,
  ObjectException,
  RepositoryException,
  BackendException,
  NoHeadRevisionException,
} from './base';
export {
  SuggestionException,
  type SuggestionErrorKind,
  type SuggestionErrorDetail,
} from './suggestion-exception';
