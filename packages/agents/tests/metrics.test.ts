import { describe, it, expect } from 'vitest';
import { AtomicMetricsSink, InMemoryMetricsRecorder } from '../orchestrator/metrics.js';

describe('AtomicMetricsSink', () => {
  it('starts empty', () => {
    expect(new AtomicMetricsSink().snapshot()).toEqual({
      totalRequests: 0,
      successfulRequests: 0,
      failedRequests: 0,
      averageResponseTimeMs: 0,
      agentCalls: {},
    });
  });

  it('counts requests and agent calls', () => {
    const sink = new AtomicMetricsSink();
    sink.recordRequest(true, 10);
    sink.recordRequest(false, 30.5);
    sink.recordAgentCall('model_engine', true, 4);
    sink.recordAgentCall('model_engine', false, 2);
    sink.recordAgentCall('insight_generator', true, 1);

    expect(sink.snapshot()).toEqual({
      totalRequests: 2,
      successfulRequests: 1,
      failedRequests: 1,
      averageResponseTimeMs: 20.25,
      agentCalls: {
        model_engine: { successes: 1, failures: 1 },
        insight_generator: { successes: 1, failures: 0 },
      },
    });
  });
});

describe('InMemoryMetricsRecorder', () => {
  it('keeps every call and summarizes them', () => {
    const recorder = new InMemoryMetricsRecorder();
    recorder.recordRequest(true, 10);
    recorder.recordRequest(true, 20);
    recorder.recordAgentCall('learning_navigator', false, 3);

    expect(recorder.requests).toHaveLength(2);
    expect(recorder.snapshot()).toMatchObject({
      totalRequests: 2,
      failedRequests: 0,
      averageResponseTimeMs: 15,
      agentCalls: { learning_navigator: { successes: 0, failures: 1 } },
    });

    recorder.reset();
    expect(recorder.snapshot().totalRequests).toBe(0);
  });
});
