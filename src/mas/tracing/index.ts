/**
 * Tracing — Observable turns, tool calls and hand-offs per session
 */

export interface TraceEvent {
  id: string;
  sessionId: string;
  timestamp: string;
  type: 'message' | 'tool_call' | 'handoff' | 'order' | 'error';
  data: Record<string, unknown>;
}

export interface SessionTrace {
  sessionId: string;
  timeline: TraceEvent[];
  summary: TraceSummary;
}

export interface TraceSummary {
  messageCount: number;
  toolCallCount: number;
  successfulToolCalls: number;
  failedToolCalls: number;
  orderPlaced: boolean;
  duration: number;
  agents: string[];
}

/**
 * Tracer for observability
 */
export class Tracer {
  private traces: Map<string, SessionTrace> = new Map();
  private logLevel: 'minimal' | 'standard' | 'verbose';

  constructor(logLevel: 'minimal' | 'standard' | 'verbose' = 'standard') {
    this.logLevel = logLevel;
  }

  /**
   * Trace a user or agent message
   */
  traceMessage(sessionId: string, role: 'user' | 'agent', content: string, agent?: string): void {
    this.addEvent(sessionId, 'message', {
      role,
      agent,
      content: this.logLevel === 'verbose' ? content : content.slice(0, 100),
      length: content.length
    });
    this.updateSummary(sessionId, s => {
      s.messageCount++;
      if (agent && !s.agents.includes(agent)) s.agents.push(agent);
    });

    if (this.logLevel !== 'minimal') {
      console.log(`[TRACE] ${role.toUpperCase()}: ${content.slice(0, 50)}...`);
    }
  }

  traceToolCall(
    sessionId: string,
    agent: string,
    tool: string,
    args: Record<string, unknown>,
    success: boolean,
    error?: string
  ): void {
    this.addEvent(sessionId, 'tool_call', {
      agent,
      tool,
      args: this.logLevel === 'verbose' ? args : { keys: Object.keys(args) },
      success,
      error
    });
    this.updateSummary(sessionId, s => {
      s.toolCallCount++;
      if (success) s.successfulToolCalls++;
      else s.failedToolCalls++;
    });

    console.log(`[TRACE] TOOL: ${agent}.${tool} → ${success ? '✓' : '✗'}`);
  }

  traceHandoff(sessionId: string, from: string, to: string, reason: string): void {
    this.addEvent(sessionId, 'handoff', { from, to, reason });
    this.updateSummary(sessionId, s => {
      if (!s.agents.includes(to)) s.agents.push(to);
    });

    console.log(`[TRACE] HANDOFF: ${from} → ${to}`);
  }

  traceOrder(sessionId: string, success: boolean, detail: Record<string, unknown>): void {
    this.addEvent(sessionId, 'order', { success, ...detail });
    if (success) {
      this.updateSummary(sessionId, s => s.orderPlaced = true);
    }

    console.log(`[TRACE] ORDER: ${success ? 'placed' : 'failed'}`);
  }

  traceError(sessionId: string, error: string, context?: Record<string, unknown>): void {
    this.addEvent(sessionId, 'error', { error, context });
    console.error(`[TRACE] ERROR: ${error}`);
  }

  /**
   * Get full trace for session (for inspection)
   */
  getTrace(sessionId: string): SessionTrace | undefined {
    const trace = this.traces.get(sessionId);
    if (!trace) return undefined;

    if (trace.timeline.length >= 2) {
      const start = new Date(trace.timeline[0].timestamp).getTime();
      const end = new Date(trace.timeline[trace.timeline.length - 1].timestamp).getTime();
      trace.summary.duration = end - start;
    }

    return trace;
  }

  /**
   * Get formatted trace output (for console/logs)
   */
  formatTrace(sessionId: string): string {
    const trace = this.getTrace(sessionId);
    if (!trace) return 'No trace found';

    const lines: string[] = [
      `\n${'='.repeat(60)}`,
      `SESSION TRACE: ${sessionId}`,
      `${'='.repeat(60)}`,
      '',
      'SUMMARY:',
      `  Messages: ${trace.summary.messageCount}`,
      `  Tool Calls: ${trace.summary.toolCallCount} (${trace.summary.successfulToolCalls} ✓, ${trace.summary.failedToolCalls} ✗)`,
      `  Order Placed: ${trace.summary.orderPlaced ? 'YES' : 'No'}`,
      `  Agents: ${trace.summary.agents.join(' → ')}`,
      `  Duration: ${trace.summary.duration}ms`,
      '',
      'TIMELINE:',
    ];

    for (const event of trace.timeline) {
      const time = event.timestamp.split('T')[1].split('.')[0];
      let line = `  [${time}] ${event.type.toUpperCase()}`;

      switch (event.type) {
        case 'message':
          line += `: ${String(event.data.role)} - "${String(event.data.content).slice(0, 40)}..."`;
          break;
        case 'tool_call':
          line += `: ${String(event.data.agent)}.${String(event.data.tool)} → ${event.data.success ? '✓' : '✗'}`;
          break;
        case 'handoff':
          line += `: ${String(event.data.from)} → ${String(event.data.to)}`;
          break;
        case 'order':
          line += `: ${event.data.success ? 'placed' : 'failed'}`;
          break;
        case 'error':
          line += `: ${String(event.data.error)}`;
          break;
      }

      lines.push(line);
    }

    lines.push('', `${'='.repeat(60)}\n`);
    return lines.join('\n');
  }

  /**
   * Export trace as JSON
   */
  exportTrace(sessionId: string): string {
    const trace = this.getTrace(sessionId);
    return JSON.stringify(trace ?? null, null, 2);
  }

  clear(): void {
    this.traces.clear();
  }

  private ensure(sessionId: string): SessionTrace {
    let trace = this.traces.get(sessionId);
    if (!trace) {
      trace = {
        sessionId,
        timeline: [],
        summary: {
          messageCount: 0,
          toolCallCount: 0,
          successfulToolCalls: 0,
          failedToolCalls: 0,
          orderPlaced: false,
          duration: 0,
          agents: []
        }
      };
      this.traces.set(sessionId, trace);
    }
    return trace;
  }

  private addEvent(sessionId: string, type: TraceEvent['type'], data: Record<string, unknown>): void {
    this.ensure(sessionId).timeline.push({
      id: `evt_${Date.now()}_${Math.random().toString(36).slice(2, 6)}`,
      sessionId,
      timestamp: new Date().toISOString(),
      type,
      data
    });
  }

  private updateSummary(sessionId: string, updater: (summary: TraceSummary) => void): void {
    updater(this.ensure(sessionId).summary);
  }
}

// Singleton instance
export const tracer = new Tracer();
