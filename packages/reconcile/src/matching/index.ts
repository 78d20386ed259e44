export { buildRosterIndex, matchCatalogToRoster } from './matcher.js';
export type { RosterIndex } from './matcher.js';
