export {
  ModgraphError,
  ModgraphErrorCode,
  Errors,
  isModgraphError,
  type ModgraphErrorDetails,
  type RecoveryHint,
} from './modgraph-error.js';
