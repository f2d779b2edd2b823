// System monitor: request metrics and model cache state

import type { AgentCapability, AgentOutput, MonitorAction } from '../types/agents.js';
import type { PermissionLevel } from '../types/permissions.js';
import { BaseAgent, assertNever } from './base-agent.js';

const CAPABILITIES: readonly AgentCapability<MonitorAction>[] = [
  {
    name: 'performance_snapshot',
    description: 'Request counters, success rate and average response time',
    requiredPermission: 'READ_EXECUTE',
    tools: ['metrics'],
    dataAccess: ['system_metrics'],
    estimatedSeconds: 0.1,
  },
  {
    name: 'model_cache_audit',
    description: 'Loaded, loading and unavailable models with failure reasons',
    requiredPermission: 'ADMIN',
    tools: ['model_registry'],
    dataAccess: ['model_cache'],
    estimatedSeconds: 0.1,
  },
];

export class SystemMonitor extends BaseAgent<MonitorAction> {
  readonly agentType = 'system_monitor';
  readonly ceiling: PermissionLevel = 'ADMIN';

  listCapabilities(): readonly AgentCapability<MonitorAction>[] {
    return CAPABILITIES;
  }

  protected async perform(action: MonitorAction): Promise<AgentOutput> {
    switch (action) {
      case 'performance_snapshot': {
        const metrics = this.deps.metrics.snapshot();
        const rate = metrics.totalRequests === 0
          ? 0
          : (metrics.successfulRequests / metrics.totalRequests) * 100;
        return {
          data: { metrics, models: this.deps.registry.stats() },
          insights: [
            `Handled ${metrics.totalRequests} requests, ${rate.toFixed(1)}% successful, average response ${metrics.averageResponseTimeMs.toFixed(1)} ms`,
          ],
        };
      }
      case 'model_cache_audit': {
        const stats = this.deps.registry.stats();
        const catalogued = this.deps.engine.catalogIds();
        const cold = catalogued.filter(
          (id) => !stats.loaded.includes(id) && !stats.unavailable.some((u) => u.modelId === id),
        );
        return {
          data: { ...stats, notLoaded: cold },
          insights: [
            `Loaded models: ${stats.loaded.length > 0 ? stats.loaded.join(', ') : 'none'}`,
            ...stats.unavailable.map((u) => `Unavailable: ${u.modelId} (${u.reason})`),
          ],
        };
      }
      default:
        return assertNever(action);
    }
  }
}
