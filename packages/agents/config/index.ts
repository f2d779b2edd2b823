export { loadSettings, getSettings, resetSettings } from './settings.js';
export type { Settings } from './settings.js';
export { ROUTING_TABLE, DEFAULT_INSTANCE_IDS, validateRoutingTable } from './routing-table.js';
export type { RouteStep, RoutingTable } from './routing-table.js';
