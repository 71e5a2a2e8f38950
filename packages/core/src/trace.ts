/**
 * Structured events emitted while editing. The CLI writes them as JSONL.
 */

export type EditTraceEventType = "edit_start" | "edit_end" | "verify_start" | "verify_end" | "write" | "resolve";

export type TraceData = Record<string, string | number | boolean>;

export interface EditTraceEvent {
  ts: string;
  sessionId: string;
  event: EditTraceEventType;
  data?: TraceData;
}

export type TraceSink = (event: EditTraceEvent) => void;

export type Tracer = (event: EditTraceEventType, data?: TraceData) => void;

export function makeTracer(sessionId: string, sink?: TraceSink): Tracer {
  return (event, data) => {
    if (!sink) return;
    const ev: EditTraceEvent = { ts: new Date().toISOString(), sessionId, event };
    if (data) ev.data = data;
    sink(ev);
  };
}
