// Flattening - nested record bodies to flat column maps

export {
  flattenValue,
  flattenRecord,
  headerTimestamp,
  ROOT_VALUE_PREFIX,
  type FlattenOptions,
} from './flattener.js';

export {
  ExtractorRegistry,
  extractorRegistry,
  createDefaultExtractorRegistry,
  BUILTIN_EXTRACTORS,
  getPath,
  type Extractor,
} from './extractors.js';
