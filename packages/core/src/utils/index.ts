export { toJoinKey } from './join-key.js';
