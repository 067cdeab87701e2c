/**
 * Reasoning history
 */

export { ReasoningTree, ROOT_ID, type ReasoningTreeOptions } from './reasoning-tree.js';
export { ChainRenderer, truncateObservation, type ChainRendererOptions } from './chain-renderer.js';
