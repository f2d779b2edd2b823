import { describe, it, expect } from 'vitest';
import { ROUTING_TABLE, validateRoutingTable, type RoutingTable } from '../config/routing-table.js';
import { QUERY_TYPES } from '../types/analysis.js';
import { AGENT_TYPES } from '../orchestrator/agent-factory.js';
import { createTestDeps } from './helpers.js';

describe('ROUTING_TABLE', () => {
  it('routes every query type', () => {
    expect(Object.keys(ROUTING_TABLE).sort()).toEqual([...QUERY_TYPES].sort());
    expect(validateRoutingTable(ROUTING_TABLE)).toEqual([]);
  });

  it('only names actions the target agent declares', () => {
    const deps = createTestDeps();
    for (const steps of Object.values(ROUTING_TABLE)) {
      for (const step of steps) {
        const agent = new AGENT_TYPES[step.agentType](step.agentId, deps);
        expect(agent.resolveAction(step.action)).toBe(step.action);
      }
    }
  });

  it('sends system status through the audit before the model listing', () => {
    expect(ROUTING_TABLE.system_status.map((s) => `${s.agentId}.${s.action}`)).toEqual([
      'system_monitor.model_cache_audit',
      'model_engine.list_models',
    ]);
  });
});

describe('validateRoutingTable', () => {
  it('reports empty routes and repeated agents', () => {
    const table: RoutingTable = {
      ...ROUTING_TABLE,
      general: [],
      statistics: [
        { agentType: 'insight_generator', agentId: 'insight_generator', action: 'statistical_summary' },
        { agentType: 'insight_generator', agentId: 'insight_generator', action: 'generate_analysis' },
      ],
    };
    expect(validateRoutingTable(table)).toEqual([
      "statistics: agent 'insight_generator' appears more than once",
      'general: route has no steps',
    ]);
  });
});
