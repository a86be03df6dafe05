export { TraceCollector } from './trace-collector.js';
export type {
  TraceEntryType,
  TraceEntry,
  TraceFilter,
  TraceSubscriber,
  ConditionTrace,
  ActionTrace,
  CycleTrace
} from './types.js';
