export {
  SchemaUnifier,
  unify,
  cellKind,
  resolveColumnType,
  projectCell,
  type UnifyOptions,
  type UnifyResult,
} from './unifier.js';
