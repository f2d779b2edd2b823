// Factory for registering agent types and owning agent instances

import type { AgentConstructor, AgentDependencies, AnalyticsAgent, AgentType } from '../types/agents.js';
import { isPermissionLevel } from '../types/permissions.js';
import { validateCapabilities } from './permissions.js';
import { AgentRegistrationError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { ModelEngineAgent } from '../agents/model-engine-agent.js';
import { InsightGenerator } from '../agents/insight-generator.js';
import { LearningNavigator } from '../agents/learning-navigator.js';
import { SystemMonitor } from '../agents/system-monitor.js';

export const AGENT_TYPES: Readonly<Record<AgentType, AgentConstructor>> = {
  model_engine: ModelEngineAgent,
  insight_generator: InsightGenerator,
  learning_navigator: LearningNavigator,
  system_monitor: SystemMonitor,
};

export class AgentFactory {
  private constructors = new Map<string, AgentConstructor>();
  private instances = new Map<string, AnalyticsAgent>();
  private readonly log: Logger;

  constructor(private readonly deps: AgentDependencies, logger?: Logger) {
    this.log = logger ?? createLogger('agent-factory');
  }

  /** Idempotent for the same constructor; a different one under a taken name throws. */
  register(typeName: string, ctor: AgentConstructor): void {
    const existing = this.constructors.get(typeName);
    if (existing === ctor) return;
    if (existing) {
      throw new AgentRegistrationError(typeName, 'already registered with a different constructor');
    }
    if (typeof ctor !== 'function') {
      throw new AgentRegistrationError(typeName, 'constructor is not a function');
    }
    this.constructors.set(typeName, ctor);
    this.log.debug({ typeName }, 'Agent type registered');
  }

  /**
   * Instantiate and enforce the agent contract. Non-conforming agents are
   * rejected here, before they can be routed to.
   */
  create(typeName: string, instanceId: string): AnalyticsAgent {
    const ctor = this.constructors.get(typeName);
    if (!ctor) {
      throw new AgentRegistrationError(typeName, 'is not registered');
    }
    if (this.instances.has(instanceId)) {
      throw new AgentRegistrationError(typeName, `instance '${instanceId}' already exists`);
    }

    const agent = new ctor(instanceId, this.deps);
    const problems = contractViolations(agent, instanceId);
    if (problems.length > 0) {
      throw new AgentRegistrationError(typeName, problems.join('; '));
    }

    this.instances.set(instanceId, agent);
    this.log.info(
      { typeName, instanceId, capabilities: agent.listCapabilities().map((c) => c.name) },
      'Agent created',
    );
    return agent;
  }

  get(instanceId: string): AnalyticsAgent | undefined {
    return this.instances.get(instanceId);
  }

  list(): AnalyticsAgent[] {
    return [...this.instances.values()];
  }

  registeredTypes(): string[] {
    return [...this.constructors.keys()];
  }

  destroy(instanceId: string): boolean {
    return this.instances.delete(instanceId);
  }

  shutdown(): void {
    const count = this.instances.size;
    this.instances.clear();
    this.log.info({ count }, 'Agent factory shut down');
  }
}

function contractViolations(agent: AnalyticsAgent, instanceId: string): string[] {
  if (typeof agent.execute !== 'function' ||
      typeof agent.listCapabilities !== 'function' ||
      typeof agent.resolveAction !== 'function') {
    return ['does not implement execute, listCapabilities and resolveAction'];
  }
  if (!isPermissionLevel(agent.ceiling)) {
    return [`has an unknown permission ceiling '${String(agent.ceiling)}'`];
  }
  const problems: string[] = [];
  if (agent.agentId !== instanceId) {
    problems.push(`reports id '${agent.agentId}' instead of '${instanceId}'`);
  }
  const capabilities = agent.listCapabilities();
  problems.push(...validateCapabilities(agent.ceiling, capabilities));
  for (const capability of capabilities) {
    if (agent.resolveAction(capability.name) !== capability.name) {
      problems.push(`capability '${capability.name}' does not resolve to an action`);
    }
  }
  return problems;
}

/** Register every built-in agent type. */
export function registerDefaultAgents(factory: AgentFactory): void {
  for (const [typeName, ctor] of Object.entries(AGENT_TYPES)) {
    factory.register(typeName, ctor);
  }
}
