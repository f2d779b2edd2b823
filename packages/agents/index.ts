// Playcaller analytics core
// Permission-scoped agents, role-aware context and ensemble model serving

export * from './orchestrator/index.js';
export * from './models/index.js';
export * from './config/index.js';
export * from './types/index.js';

export { BaseAgent } from './agents/base-agent.js';
export { ModelEngineAgent } from './agents/model-engine-agent.js';
export { InsightGenerator } from './agents/insight-generator.js';
export { LearningNavigator } from './agents/learning-navigator.js';
export { SystemMonitor } from './agents/system-monitor.js';
export { ContentCatalog } from './content/content-catalog.js';
export type { LearningResource, SkillLevel } from './content/content-catalog.js';

export * from './utils/errors.js';
export { createLogger, logger } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
