export { OutputSink, EVENT_COLUMNS, POSTING_COLUMNS, renderEventsCsv, renderPostingsCsv, sinkPaths } from './sink.js';
export type { OutputSinkOptions, SinkInput, SinkPaths } from './sink.js';
export { encodeCsv, encodeCsvField, encodeCsvRow, encodeRecordsCsv } from './csv.js';
