export { summarizePacking, formatPackingText, packingToJson } from './summary.js';
export type { PackingSummary } from './summary.js';
