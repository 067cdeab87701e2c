/**
 * Structure resolvers
 *
 * Signature and block-header lookup for the context renderer and the
 * code-context tools.
 */

export { IndentStructureResolver, buildIndentStructure } from './indent-structure-resolver.js';
export {
  TreeSitterStructureResolver,
  buildSyntaxStructure,
  type SyntaxNodeLike,
} from './tree-sitter-structure-resolver.js';
export { splitSourceLines, type FileStructure, type DefinitionRange } from './file-structure.js';
