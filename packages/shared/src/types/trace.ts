export type TraceEventType =
  | 'state_transition'
  | 'model_call'
  | 'tool_call'
  | 'memory_query'
  | 'memory_analysis'
  | 'memory_persist'
  | 'search_decision'
  | 'delivery'
  | 'degraded'
  | 'error'
  | 'info';

export interface TraceEvent {
  id: string;
  traceId: string;
  parentSpanId?: string;
  type: TraceEventType;
  timestamp: number;
  wallClock: string;
  duration?: number;
  data: Record<string, unknown>;
}

export interface TraceSpan {
  id: string;
  traceId: string;
  name: string;
  startTime: number;
  endTime?: number;
  events: TraceEvent[];
  children: TraceSpan[];
}

export interface ExecutionTrace {
  traceId: string;
  question: string;
  user: string;
  startedAt: string;
  completedAt?: string;
  totalDurationMs?: number;
  spans: TraceSpan[];
}
