// Ranked permission levels shared by agents, callers and the orchestrator

export const PERMISSION_LEVELS = [
  'READ_ONLY',
  'READ_EXECUTE',
  'READ_EXECUTE_WRITE',
  'ADMIN',
] as const;

export type PermissionLevel = typeof PERMISSION_LEVELS[number];

const RANK: Record<PermissionLevel, number> = {
  READ_ONLY: 1,
  READ_EXECUTE: 2,
  READ_EXECUTE_WRITE: 3,
  ADMIN: 4,
};

export function permissionRank(level: PermissionLevel): number {
  return RANK[level];
}

/** True when `granted` covers `required`. */
export function isAtLeast(granted: PermissionLevel, required: PermissionLevel): boolean {
  return RANK[granted] >= RANK[required];
}

export function isPermissionLevel(value: unknown): value is PermissionLevel {
  return typeof value === 'string' && PERMISSION_LEVELS.some((level) => level === value);
}
