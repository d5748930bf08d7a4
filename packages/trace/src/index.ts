export { SEVERITY_ORDER, TRACE_SEVERITIES, atLeast, isSeverity } from './events.js';
export type { TraceContext, TraceEvent, TraceSeverity, TraceSink, TraceValue } from './events.js';
export { filterEvents, parseFilters } from './filters.js';
export type { Predicate } from './filters.js';
export { createMemorySink } from './sink/memory.js';
export type { MemorySink } from './sink/memory.js';
export { openJsonlSink, stdoutSink } from './sink/jsonl.js';
export type { JsonlSink } from './sink/jsonl.js';
export { validateTraceEvent } from './validate.js';
export type { ValidationIssue, ValidationResult } from './validate.js';
export { ingestTraceFile, ingestTraceText } from './ingest.js';
export type { TraceIngestError, TraceIngestResult } from './ingest.js';
export { summarizeTrace } from './summary.js';
export type { TraceSummary } from './summary.js';
