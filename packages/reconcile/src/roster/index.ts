export { RosterReader } from './roster-reader.js';
export type { RosterReaderOptions } from './roster-reader.js';
