export { HealthMonitor } from './monitor.js';
export type { HealthMonitorOptions, HealthSnapshot } from './monitor.js';
