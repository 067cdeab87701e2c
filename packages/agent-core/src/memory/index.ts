/**
 * Code-context memory
 */

export { CodeContextStore, type CodeContextSnapshot } from './code-context-store.js';
