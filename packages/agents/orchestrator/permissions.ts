// Capability permission checks. Unknown or ambiguous capabilities never grant.

import type { AgentCapability, AnalyticsAgent } from '../types/agents.js';
import type { Role } from '../types/context.js';
import { isAtLeast, type PermissionLevel } from '../types/permissions.js';
import { CapabilityNotFoundError, PermissionDeniedError } from '../utils/errors.js';

export type PermissionCheck =
  | { allowed: true; capability: AgentCapability }
  | { allowed: false; code: 'CapabilityNotFound'; message: string }
  | {
      allowed: false;
      code: 'PermissionDenied';
      required: PermissionLevel;
      granted: PermissionLevel;
      message: string;
    };

export const ROLE_PERMISSIONS: Readonly<Record<Role, PermissionLevel>> = {
  analyst: 'READ_EXECUTE_WRITE',
  data_scientist: 'READ_EXECUTE_WRITE',
  production: 'READ_EXECUTE',
};

export function checkPermission(
  agent: AnalyticsAgent,
  capabilityName: string,
  granted: PermissionLevel,
): PermissionCheck {
  const matches = agent.listCapabilities().filter((c) => c.name === capabilityName);
  const capability = matches[0];
  if (!capability || matches.length > 1) {
    return {
      allowed: false,
      code: 'CapabilityNotFound',
      message: `Agent '${agent.agentId}' has no capability '${capabilityName}'`,
    };
  }
  if (!isAtLeast(granted, capability.requiredPermission)) {
    return {
      allowed: false,
      code: 'PermissionDenied',
      required: capability.requiredPermission,
      granted,
      message: `'${capabilityName}' requires ${capability.requiredPermission}; caller has ${granted}`,
    };
  }
  return { allowed: true, capability };
}

/** The error behind a refused call: denied by level, or no such capability. */
export function refusalError(
  agentId: string,
  capabilityName: string,
  check: PermissionCheck,
): PermissionDeniedError | CapabilityNotFoundError {
  if (!check.allowed && check.code === 'PermissionDenied') {
    return new PermissionDeniedError(capabilityName, check.required, check.granted);
  }
  return new CapabilityNotFoundError(agentId, capabilityName);
}

/** Contract violations in a capability set declared under `ceiling`. */
export function validateCapabilities(
  ceiling: PermissionLevel,
  capabilities: readonly AgentCapability[],
): string[] {
  const problems: string[] = [];
  if (capabilities.length === 0) {
    problems.push('declares no capabilities');
  }
  const seen = new Set<string>();
  for (const capability of capabilities) {
    if (seen.has(capability.name)) {
      problems.push(`capability '${capability.name}' is declared more than once`);
    }
    seen.add(capability.name);
    if (!isAtLeast(ceiling, capability.requiredPermission)) {
      problems.push(
        `capability '${capability.name}' requires ${capability.requiredPermission}, above ceiling ${ceiling}`,
      );
    }
  }
  return problems;
}
