/**
 * Reply parsing
 */

export { parseReply, stripBackticks } from './reply-parser.js';
export { extractCitations, countReferences, type Citation } from './citation-parser.js';
