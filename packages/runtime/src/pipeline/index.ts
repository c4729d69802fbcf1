// Conversion pipeline

export {
  convertRecords,
  convertFiles,
  DEFAULT_TABLE_FORMAT,
  type ConvertOptions,
  type ConvertFilesOptions,
  type ChannelConversion,
  type ConversionReport,
  type TableReport,
  type InputReport,
} from './convert.js';

export { summarizeSource, type SourceSummary, type TopicSummary } from './summary.js';
