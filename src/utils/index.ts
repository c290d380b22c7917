export { stableSortBy, canonicalizeOutput } from './sorting.js';
