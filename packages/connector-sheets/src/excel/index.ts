export { WorkbookClient, createWorkbookClient, cellText } from './client.js';
export type { WorkbookClientConfig } from './client.js';
