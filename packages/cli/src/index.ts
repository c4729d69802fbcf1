// @flatlog/cli
// The flatlog command tree, for embedding and tests

export { createProgram, run, processIo, type CliIo } from './program.js';
export { formatCell, formatJson, formatTable, plural, type TableOptions } from './output.js';
