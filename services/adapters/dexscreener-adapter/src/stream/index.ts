/**
 * 行情流编排模块导出
 */

export { RecordFilter } from './RecordFilter';
export type { RecordFilterOptions } from './RecordFilter';
export { StreamOrchestrator, StreamEvent, StreamBusyError } from './StreamOrchestrator';
export type {
  BatchConsumer,
  CollectBatchOptions,
  RecordBatch,
  StreamExit,
  StreamOrchestratorOptions,
  StreamStats
} from './StreamOrchestrator';
