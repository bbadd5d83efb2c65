export { HandleManager, NULL_HANDLE } from './handle-manager.js';
export type { Handle } from './handle-manager.js';
export { HandleTokens } from './handle-tokens.js';
