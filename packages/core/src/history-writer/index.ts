export { HistoryWriter } from './history-writer.js';
export type { StateWrite, WriteOutcome, WriteResult, HistoryWriterOptions } from './history-writer.js';
