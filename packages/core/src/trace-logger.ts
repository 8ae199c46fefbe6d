import { mkdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  generateId,
  monotonicNow,
  isoNow,
  type Capability,
  type ExecutionTrace,
  type ModelResponse,
  type QuestionContext,
  type ToolInvocation,
  type ToolResult,
  type TraceEvent,
  type TraceEventType,
  type TraceSpan,
} from '@steward/shared';

interface TraceState {
  traceId: string;
  question: string;
  user: string;
  startedAt: string;
  startTime: number;
  spans: TraceSpan[];
  spanStack: string[];
  /** Events logged while no span is open. */
  rootEvents: TraceEvent[];
}

/** Records what happened during one request: spans, state transitions, model and tool calls. */
export class TraceLogger {
  private traces = new Map<string, TraceState>();

  createTrace(traceId: string, context: QuestionContext): void {
    this.traces.set(traceId, {
      traceId,
      question: context.question,
      user: context.user,
      startedAt: isoNow(),
      startTime: monotonicNow(),
      spans: [],
      spanStack: [],
      rootEvents: [],
    });
  }

  startSpan(traceId: string, name: string, data?: Record<string, unknown>): string {
    const state = this.getState(traceId);
    const spanId = generateId('span');
    const parentSpanId = state.spanStack.length > 0
      ? state.spanStack[state.spanStack.length - 1]
      : undefined;

    const span: TraceSpan = {
      id: spanId,
      traceId,
      name,
      startTime: monotonicNow(),
      events: [],
      children: [],
    };

    if (parentSpanId) {
      const parent = this.findSpan(state.spans, parentSpanId);
      parent?.children.push(span);
    } else {
      state.spans.push(span);
    }

    state.spanStack.push(spanId);
    if (data) {
      this.logEvent(traceId, 'info', data, spanId);
    }
    return spanId;
  }

  endSpan(traceId: string, spanId: string): void {
    const state = this.getState(traceId);
    const span = this.findSpan(state.spans, spanId);
    if (span) {
      span.endTime = monotonicNow();
    }
    const idx = state.spanStack.indexOf(spanId);
    if (idx !== -1) {
      state.spanStack.splice(idx, 1);
    }
  }

  logEvent(
    traceId: string,
    type: TraceEventType,
    data: Record<string, unknown>,
    parentSpanId?: string,
  ): void {
    const state = this.getState(traceId);
    const event: TraceEvent = {
      id: generateId('evt'),
      traceId,
      parentSpanId: parentSpanId ?? state.spanStack[state.spanStack.length - 1],
      type,
      timestamp: monotonicNow(),
      wallClock: isoNow(),
      data,
    };

    const span = event.parentSpanId ? this.findSpan(state.spans, event.parentSpanId) : undefined;
    if (span) {
      span.events.push(event);
    } else {
      state.rootEvents.push(event);
    }
  }

  logStateTransition(traceId: string, from: string, to: string): void {
    this.logEvent(traceId, 'state_transition', { from, to });
  }

  logModelCall(traceId: string, purpose: string, response: ModelResponse): void {
    this.logEvent(traceId, 'model_call', {
      purpose,
      provider: response.provider,
      model: response.model,
      promptTokens: response.tokenUsage.promptTokens,
      completionTokens: response.tokenUsage.completionTokens,
      totalTokens: response.tokenUsage.totalTokens,
      latencyMs: response.latencyMs,
      finishReason: response.finishReason,
      toolCalls: response.toolCalls.map(c => c.name),
    });
  }

  logToolCall(traceId: string, invocation: ToolInvocation, result: ToolResult): void {
    this.logEvent(traceId, 'tool_call', {
      toolName: result.toolName,
      input: invocation.input,
      success: result.success,
      durationMs: result.durationMs,
      error: result.error,
    });
  }

  logDegraded(traceId: string, capability: Capability, reason: string): void {
    this.logEvent(traceId, 'degraded', { capability, reason });
  }

  /** Finishes the trace and drops it from memory. */
  getTrace(traceId: string): ExecutionTrace {
    const state = this.getState(traceId);
    const spans = [...state.spans];
    if (state.rootEvents.length > 0) {
      spans.unshift({
        id: `${traceId}_root`,
        traceId,
        name: 'request',
        startTime: state.startTime,
        endTime: monotonicNow(),
        events: state.rootEvents,
        children: [],
      });
    }

    const trace: ExecutionTrace = {
      traceId: state.traceId,
      question: state.question,
      user: state.user,
      startedAt: state.startedAt,
      completedAt: isoNow(),
      totalDurationMs: monotonicNow() - state.startTime,
      spans,
    };

    this.traces.delete(traceId);
    return trace;
  }

  hasTrace(traceId: string): boolean {
    return this.traces.has(traceId);
  }

  /** Writes the trace as `<dir>/<traceId>.json` and returns the path. */
  async saveTrace(trace: ExecutionTrace, dir: string): Promise<string> {
    await mkdir(dir, { recursive: true });
    const file = join(dir, `${trace.traceId}.json`);
    await writeFile(file, JSON.stringify(trace, null, 2), 'utf-8');
    return file;
  }

  private getState(traceId: string): TraceState {
    const state = this.traces.get(traceId);
    if (!state) throw new Error(`Trace not found: ${traceId}`);
    return state;
  }

  private findSpan(spans: TraceSpan[], id: string): TraceSpan | undefined {
    for (const span of spans) {
      if (span.id === id) return span;
      const found = this.findSpan(span.children, id);
      if (found) return found;
    }
    return undefined;
  }
}
