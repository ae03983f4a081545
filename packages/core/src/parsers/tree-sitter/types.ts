/**
 * Tree-sitter Type Definitions
 *
 * The subset of the tree-sitter node binding that the analyzers rely on.
 * The binding is loaded dynamically, so these interfaces describe the
 * shape we expect from it.
 */

/**
 * Represents a point (position) in tree-sitter.
 */
export interface TreeSitterPoint {
  /** Row (0-indexed line number) */
  row: number;
  /** Column (0-indexed character offset) */
  column: number;
}

/**
 * Represents a tree-sitter syntax node.
 */
export interface TreeSitterNode {
  /** The type of the node (e.g., 'function_definition', 'for_statement') */
  type: string;
  /** The text content of the node */
  text: string;
  /** Start position in the source */
  startPosition: TreeSitterPoint;
  /** End position in the source */
  endPosition: TreeSitterPoint;
  /** Start byte offset in the source */
  startIndex: number;
  /** End byte offset in the source */
  endIndex: number;
  /** Whether this is a named node (vs anonymous) */
  isNamed: boolean;
  /** Whether this node was inserted by error recovery */
  isMissing: boolean;
  /** Child nodes */
  children: TreeSitterNode[];
  /** Named child nodes only */
  namedChildren: TreeSitterNode[];
  /** Get child by field name */
  childForFieldName(fieldName: string): TreeSitterNode | null;
}

/**
 * Represents a tree-sitter syntax tree.
 */
export interface TreeSitterTree {
  /** The root node of the tree */
  rootNode: TreeSitterNode;
}

/**
 * Options accepted by the node binding's parse().
 */
export interface TreeSitterParseOptions {
  /** Size of the buffer used to pass the source to the parser */
  bufferSize?: number;
}

/**
 * Represents a tree-sitter parser.
 */
export interface TreeSitterParser {
  /** Set the language for parsing */
  setLanguage(language: TreeSitterLanguage): void;
  /** Parse source code; null when the timeout expired */
  parse(input: string, oldTree?: TreeSitterTree | null, options?: TreeSitterParseOptions): TreeSitterTree | null;
  /** Set timeout in microseconds */
  setTimeoutMicros(timeout: number): void;
}

/**
 * Opaque grammar object exported by a tree-sitter language package.
 */
export interface TreeSitterLanguage {
  /** Grammar name, when the package exposes it */
  name?: string;
}
