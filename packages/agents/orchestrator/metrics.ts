// Request and agent-call counters behind an injectable sink

export interface AgentCallCounts {
  successes: number;
  failures: number;
}

export interface MetricsSnapshot {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  averageResponseTimeMs: number;
  agentCalls: Record<string, AgentCallCounts>;
}

export interface MetricsSink {
  recordRequest(success: boolean, durationMs: number): void;
  recordAgentCall(agentId: string, success: boolean, durationMs: number): void;
  snapshot(): MetricsSnapshot;
}

const TOTAL = 0;
const SUCCEEDED = 1;
const FAILED = 2;
const DURATION_US = 3;

function newCounters(slots: number): BigInt64Array {
  return new BigInt64Array(new SharedArrayBuffer(slots * BigInt64Array.BYTES_PER_ELEMENT));
}

function micros(durationMs: number): bigint {
  return BigInt(Math.max(0, Math.round(durationMs * 1000)));
}

/**
 * Counters on shared memory updated with Atomics, so a sink handed to worker
 * threads stays consistent.
 */
export class AtomicMetricsSink implements MetricsSink {
  private readonly requests = newCounters(4);
  private readonly agents = new Map<string, BigInt64Array>();

  recordRequest(success: boolean, durationMs: number): void {
    Atomics.add(this.requests, TOTAL, 1n);
    Atomics.add(this.requests, success ? SUCCEEDED : FAILED, 1n);
    Atomics.add(this.requests, DURATION_US, micros(durationMs));
  }

  recordAgentCall(agentId: string, success: boolean, _durationMs: number): void {
    let counters = this.agents.get(agentId);
    if (!counters) {
      counters = newCounters(2);
      this.agents.set(agentId, counters);
    }
    Atomics.add(counters, success ? 0 : 1, 1n);
  }

  snapshot(): MetricsSnapshot {
    const total = Number(Atomics.load(this.requests, TOTAL));
    const durationUs = Number(Atomics.load(this.requests, DURATION_US));
    const agentCalls: Record<string, AgentCallCounts> = {};
    for (const [agentId, counters] of this.agents) {
      agentCalls[agentId] = {
        successes: Number(Atomics.load(counters, 0)),
        failures: Number(Atomics.load(counters, 1)),
      };
    }
    return {
      totalRequests: total,
      successfulRequests: Number(Atomics.load(this.requests, SUCCEEDED)),
      failedRequests: Number(Atomics.load(this.requests, FAILED)),
      averageResponseTimeMs: total === 0 ? 0 : durationUs / total / 1000,
      agentCalls,
    };
  }
}

export interface RecordedRequest {
  success: boolean;
  durationMs: number;
}

export interface RecordedAgentCall extends RecordedRequest {
  agentId: string;
}

/** Keeps every call for assertions. */
export class InMemoryMetricsRecorder implements MetricsSink {
  readonly requests: RecordedRequest[] = [];
  readonly agentCalls: RecordedAgentCall[] = [];

  recordRequest(success: boolean, durationMs: number): void {
    this.requests.push({ success, durationMs });
  }

  recordAgentCall(agentId: string, success: boolean, durationMs: number): void {
    this.agentCalls.push({ agentId, success, durationMs });
  }

  snapshot(): MetricsSnapshot {
    const total = this.requests.length;
    const successes = this.requests.filter((r) => r.success).length;
    const duration = this.requests.reduce((sum, r) => sum + r.durationMs, 0);
    const agentCalls: Record<string, AgentCallCounts> = {};
    for (const call of this.agentCalls) {
      const counts = agentCalls[call.agentId] ?? { successes: 0, failures: 0 };
      if (call.success) counts.successes++;
      else counts.failures++;
      agentCalls[call.agentId] = counts;
    }
    return {
      totalRequests: total,
      successfulRequests: successes,
      failedRequests: total - successes,
      averageResponseTimeMs: total === 0 ? 0 : duration / total,
      agentCalls,
    };
  }

  reset(): void {
    this.requests.length = 0;
    this.agentCalls.length = 0;
  }
}
